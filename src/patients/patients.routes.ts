import { Response, Router } from 'express';
import { AuthRequest, authMiddleware, currentUser, requireStaff } from '../middleware/auth.middleware';
import { validateRequest, validated } from '../middleware/validation.middleware';
import { uploadPatientPhoto, uploadUrl } from '../middleware/upload.middleware';
import type { Services } from '../services';
import type { PatientInput } from './patients.service';
import { NewBreed, NewSpecies, SEXES } from '../types/patient.types';
import { ValidationError, sendError } from '../utils/errors';
import { boolQuery, enumQuery, idParam, intQuery, textQuery } from '../utils/query';

type SpeciesInput = Partial<NewSpecies> & { name: string };
type BreedInput = Partial<NewBreed> & { species_id: number; name: string };

/** Species and breed catalogue, mounted under /api/patients. */
function createTaxonomyRoutes(router: Router, { patients }: Services) {
  router.get('/species', async (req: AuthRequest, res) => {
    try {
      res.json(
        await patients.listSpecies({ active: boolQuery(req.query.active, 'active'), search: textQuery(req.query.search) })
      );
    } catch (err) {
      sendError(res, err, 'Failed to list species');
    }
  });

  router.get('/species/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await patients.getSpecies(idParam(req.params.id, 'Species')));
    } catch (err) {
      sendError(res, err, 'Failed to load species');
    }
  });

  router.get('/species/:id/breeds', async (req: AuthRequest, res) => {
    try {
      res.json(await patients.speciesBreeds(idParam(req.params.id, 'Species')));
    } catch (err) {
      sendError(res, err, 'Failed to list breeds');
    }
  });

  router.post('/species', requireStaff, validateRequest('createSpecies'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await patients.createSpecies(validated<SpeciesInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create species');
    }
  });

  router.put('/species/:id', requireStaff, validateRequest('updateSpecies'), async (req: AuthRequest, res) => {
    try {
      res.json(await patients.updateSpecies(idParam(req.params.id, 'Species'), validated<Partial<NewSpecies>>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update species');
    }
  });

  router.delete('/species/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      await patients.deleteSpecies(idParam(req.params.id, 'Species'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete species');
    }
  });

  router.get('/breeds', async (req: AuthRequest, res) => {
    try {
      res.json(
        await patients.listBreeds({
          speciesId: intQuery(req.query.species_id, 'species_id'),
          active: boolQuery(req.query.active, 'active'),
          search: textQuery(req.query.search),
        })
      );
    } catch (err) {
      sendError(res, err, 'Failed to list breeds');
    }
  });

  router.get('/breeds/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await patients.getBreed(idParam(req.params.id, 'Breed')));
    } catch (err) {
      sendError(res, err, 'Failed to load breed');
    }
  });

  router.post('/breeds', requireStaff, validateRequest('createBreed'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await patients.createBreed(validated<BreedInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create breed');
    }
  });

  router.put('/breeds/:id', requireStaff, validateRequest('updateBreed'), async (req: AuthRequest, res) => {
    try {
      res.json(await patients.updateBreed(idParam(req.params.id, 'Breed'), validated<Partial<NewBreed>>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to update breed');
    }
  });

  router.delete('/breeds/:id', requireStaff, async (req: AuthRequest, res) => {
    try {
      await patients.deleteBreed(idParam(req.params.id, 'Breed'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to delete breed');
    }
  });
}

export function createPatientsRouter(services: Services): Router {
  const { patients } = services;
  const router = Router();
  router.use(authMiddleware);

  createTaxonomyRoutes(router, services);

  router.get('/', async (req: AuthRequest, res) => {
    try {
      const list = await patients.list(currentUser(req), {
        guardianId: intQuery(req.query.guardian_id, 'guardian_id'),
        speciesId: intQuery(req.query.species_id, 'species_id'),
        breedId: intQuery(req.query.breed_id, 'breed_id'),
        sex: enumQuery(req.query.sex, 'sex', SEXES),
        active: boolQuery(req.query.active, 'active'),
        deceased: boolQuery(req.query.deceased, 'deceased'),
        search: textQuery(req.query.search),
      });
      res.json(list);
    } catch (err) {
      sendError(res, err, 'Failed to list patients');
    }
  });

  router.get('/mine', async (req: AuthRequest, res) => {
    try {
      res.json(await patients.mine(currentUser(req)));
    } catch (err) {
      sendError(res, err, 'Failed to list patients');
    }
  });

  router.get('/:id', async (req: AuthRequest, res) => {
    try {
      res.json(await patients.get(currentUser(req), idParam(req.params.id, 'Patient')));
    } catch (err) {
      sendError(res, err, 'Failed to load patient');
    }
  });

  router.post('/', validateRequest('createPatient'), async (req: AuthRequest, res) => {
    try {
      res.status(201).json(await patients.create(currentUser(req), validated<PatientInput>(req)));
    } catch (err) {
      sendError(res, err, 'Failed to create patient');
    }
  });

  const update = async (req: AuthRequest, res: Response) => {
    try {
      res.json(
        await patients.update(currentUser(req), idParam(req.params.id, 'Patient'), validated<PatientInput>(req))
      );
    } catch (err) {
      sendError(res, err, 'Failed to update patient');
    }
  };
  router.put('/:id', validateRequest('updatePatient'), update);
  router.patch('/:id', validateRequest('updatePatient'), update);

  router.delete('/:id', async (req: AuthRequest, res) => {
    try {
      await patients.deactivate(currentUser(req), idParam(req.params.id, 'Patient'));
      res.status(204).end();
    } catch (err) {
      sendError(res, err, 'Failed to deactivate patient');
    }
  });

  router.post('/:id/deceased', validateRequest('markDeceased'), async (req: AuthRequest, res) => {
    try {
      const { deceased_on } = validated<{ deceased_on: string }>(req);
      res.json(await patients.markDeceased(currentUser(req), idParam(req.params.id, 'Patient'), deceased_on));
    } catch (err) {
      sendError(res, err, 'Failed to mark patient as deceased');
    }
  });

  router.post('/:id/weight', validateRequest('updateWeight'), async (req: AuthRequest, res) => {
    try {
      const { weight_kg } = validated<{ weight_kg: number }>(req);
      res.json(await patients.updateWeight(currentUser(req), idParam(req.params.id, 'Patient'), weight_kg));
    } catch (err) {
      sendError(res, err, 'Failed to update weight');
    }
  });

  router.post('/:id/photo', uploadPatientPhoto.single('photo'), async (req: AuthRequest, res) => {
    try {
      if (!req.file) throw ValidationError.field('photo', 'An image file is required');
      const url = uploadUrl('patients', req.file);
      res.json(await patients.setPhoto(currentUser(req), idParam(req.params.id, 'Patient'), url));
    } catch (err) {
      sendError(res, err, 'Failed to upload photo');
    }
  });

  return router;
}
