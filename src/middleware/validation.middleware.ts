import { Request, Response, NextFunction } from 'express';
import { body, matchedData, validationResult, ValidationChain } from 'express-validator';
import { ROLES } from '../types/user.types';
import { SEXES } from '../types/patient.types';
import { APPOINTMENT_TYPES } from '../types/appointment.types';
import { ATTACHMENT_TYPES, PROGNOSES } from '../types/clinical.types';
import { MOVEMENT_TYPES, OUTBOUND_TYPES, PRODUCT_CATEGORIES, PRODUCT_UNITS } from '../types/inventory.types';
import type { FieldErrors } from '../utils/errors';

const DAY = /^\d{4}-\d{2}-\d{2}$/;
const PHONE = /^\+?1?\d{9,15}$/;

const nullable = { values: 'null' } as const;

const text = (field: string) => body(field).optional().isString().withMessage(`${field} must be a string`).trim();
const required = (field: string) =>
  body(field).exists({ values: 'falsy' }).withMessage(`${field} is required`).bail().isString().trim().notEmpty().withMessage(`${field} is required`);
const id = (field: string) => body(field).isInt({ min: 1 }).withMessage(`${field} must be a numeric id`).toInt();
const optionalId = (field: string) =>
  body(field).optional(nullable).isInt({ min: 1 }).withMessage(`${field} must be a numeric id`).toInt();
const day = (field: string) => body(field).matches(DAY).withMessage(`${field} must be a date (YYYY-MM-DD)`);
const optionalDay = (field: string) =>
  body(field).optional(nullable).matches(DAY).withMessage(`${field} must be a date (YYYY-MM-DD)`);
const flag = (field: string) => body(field).optional().isBoolean().withMessage(`${field} must be true or false`).toBoolean();
const oneOf = (field: string, values: readonly string[]) =>
  body(field).optional().isIn(values).withMessage(`${field} must be one of: ${values.join(', ')}`);
const decimal = (field: string, min: number, max?: number) =>
  body(field)
    .optional(nullable)
    .isFloat(max === undefined ? { min } : { min, max })
    .withMessage(max === undefined ? `${field} must be at least ${min}` : `${field} must be between ${min} and ${max}`)
    .toFloat();
const integer = (field: string, min: number, max?: number) =>
  body(field)
    .optional(nullable)
    .isInt(max === undefined ? { min } : { min, max })
    .withMessage(max === undefined ? `${field} must be an integer of at least ${min}` : `${field} must be an integer between ${min} and ${max}`)
    .toInt();

const userProfileFields = [
  text('first_name'),
  text('last_name'),
  body('phone').optional(nullable).matches(PHONE).withMessage("phone must look like '+999999999' (up to 15 digits)"),
  text('address'),
  optionalDay('birth_date'),
  body('license_number').optional(nullable).isString().trim(),
  text('specialty'),
];

const patientFields = [
  text('name'),
  optionalId('guardian_id'),
  optionalId('species_id'),
  optionalId('breed_id'),
  oneOf('sex', SEXES),
  optionalDay('birth_date'),
  text('color'),
  decimal('weight_kg', 0.01),
  body('microchip').optional(nullable).isString().trim(),
  flag('sterilized'),
  text('allergies'),
  text('chronic_conditions'),
  text('notes'),
  flag('active'),
];

const appointmentFields = [
  optionalId('guardian_id'),
  optionalId('vet_id'),
  integer('duration_minutes', 1),
  oneOf('type', APPOINTMENT_TYPES),
  text('notes'),
  text('internal_notes'),
];

const episodeFields = [
  text('motive'),
  text('definitive_diagnosis'),
  text('medications'),
  text('procedures'),
  oneOf('prognosis', PROGNOSES),
  text('home_instructions'),
  optionalDay('next_checkup_on'),
];

const productFields = [
  text('description'),
  oneOf('category', PRODUCT_CATEGORIES),
  text('active_ingredient'),
  text('concentration'),
  text('manufacturer'),
  oneOf('unit', PRODUCT_UNITS),
  integer('min_stock', 0),
  integer('max_stock', 0),
  decimal('purchase_price', 0),
  decimal('sale_price', 0),
  flag('requires_prescription'),
  flag('lot_tracked'),
  flag('active'),
];

const movementFields = [
  id('lot_id'),
  body('quantity').isInt({ min: 1 }).withMessage('quantity must be greater than 0').toInt(),
  optionalId('clinical_episode_id'),
  required('reason'),
  text('reference_document'),
];

/**
 * Request validation schemas keyed by name used across the routes.
 * Only fields declared here reach the handlers (see `validated`).
 */
const schemas = {
  register: [
    body('email').isEmail().withMessage('email must be a valid address').toLowerCase(),
    body('password').isString().isLength({ min: 8 }).withMessage('Password must be at least 8 characters'),
    body('password_confirm')
      .custom((value, { req }) => value === req.body.password)
      .withMessage('Passwords do not match'),
    required('first_name'),
    required('last_name'),
    ...userProfileFields.slice(2, 5),
  ],
  login: [
    body('email').isString().withMessage('email is required').trim().toLowerCase(),
    body('password').isString().withMessage('password is required').notEmpty().withMessage('password is required'),
  ],
  changePassword: [
    body('current_password').isString().notEmpty().withMessage('current_password is required'),
    body('new_password').isString().isLength({ min: 8 }).withMessage('Password must be at least 8 characters'),
  ],
  createUser: [
    body('email').isEmail().withMessage('email must be a valid address').toLowerCase(),
    body('password').isString().isLength({ min: 8 }).withMessage('Password must be at least 8 characters'),
    body('role').isIn(ROLES).withMessage(`role must be one of: ${ROLES.join(', ')}`),
    required('first_name'),
    required('last_name'),
    ...userProfileFields.slice(2),
    flag('active'),
  ],
  updateUser: [
    body('email').optional().isEmail().withMessage('email must be a valid address').toLowerCase(),
    body('password').optional().isString().isLength({ min: 8 }).withMessage('Password must be at least 8 characters'),
    body('role').optional().isIn(ROLES).withMessage(`role must be one of: ${ROLES.join(', ')}`),
    ...userProfileFields,
    flag('active'),
  ],
  updateProfile: [...userProfileFields],
  createSpecies: [required('name'), text('description'), flag('active')],
  updateSpecies: [text('name'), text('description'), flag('active')],
  createBreed: [id('species_id'), required('name'), text('description'), flag('active')],
  updateBreed: [optionalId('species_id'), text('name'), text('description'), flag('active')],
  createPatient: [required('name'), id('species_id'), ...patientFields.slice(1)],
  updatePatient: [...patientFields],
  markDeceased: [day('deceased_on')],
  updateWeight: [
    body('weight_kg').isFloat({ min: 0.01 }).withMessage('weight_kg must be a positive number').toFloat(),
  ],
  createAppointment: [
    id('patient_id'),
    body('scheduled_at').isISO8601().withMessage('scheduled_at must be an ISO 8601 date-time').toDate(),
    required('reason'),
    ...appointmentFields,
  ],
  updateAppointment: [
    optionalId('patient_id'),
    body('scheduled_at').optional().isISO8601().withMessage('scheduled_at must be an ISO 8601 date-time').toDate(),
    text('reason'),
    ...appointmentFields,
  ],
  cancelAppointment: [text('reason')],
  createEpisode: [
    id('appointment_id'),
    optionalId('vet_id'),
    required('history'),
    required('physical_exam'),
    required('presumptive_diagnosis'),
    required('treatment_plan'),
    ...episodeFields,
  ],
  updateEpisode: [
    text('history'),
    text('physical_exam'),
    text('presumptive_diagnosis'),
    text('treatment_plan'),
    ...episodeFields,
  ],
  createVitals: [
    id('episode_id'),
    body('weight_kg').isFloat({ min: 0.01 }).withMessage('weight_kg must be a positive number').toFloat(),
    decimal('temperature_c', 30, 45),
    integer('heart_rate', 10, 300),
    integer('respiratory_rate', 5, 100),
    integer('systolic_bp', 0),
    integer('diastolic_bp', 0),
    decimal('capillary_refill_s', 0.1, 10),
    integer('body_condition_score', 1, 9),
    text('notes'),
  ],
  createAttachment: [id('episode_id'), oneOf('type', ATTACHMENT_TYPES), required('title'), text('description')],
  createProduct: [required('code'), required('name'), ...productFields],
  updateProduct: [text('code'), text('name'), ...productFields],
  createLot: [
    id('product_id'),
    required('lot_number'),
    optionalDay('manufactured_on'),
    day('expires_on'),
    body('initial_stock').isInt({ min: 0 }).withMessage('initial_stock must be an integer of at least 0').toInt(),
    decimal('lot_purchase_price', 0),
    text('supplier'),
    flag('active'),
  ],
  updateLot: [
    text('lot_number'),
    optionalDay('manufactured_on'),
    body('expires_on').optional().matches(DAY).withMessage('expires_on must be a date (YYYY-MM-DD)'),
    decimal('lot_purchase_price', 0),
    text('supplier'),
    flag('active'),
    body('current_stock').not().exists().withMessage('current_stock only changes through stock movements'),
    body('initial_stock').not().exists().withMessage('initial_stock cannot be changed after intake'),
  ],
  createMovement: [
    body('type').isIn(MOVEMENT_TYPES).withMessage(`type must be one of: ${MOVEMENT_TYPES.join(', ')}`),
    ...movementFields,
  ],
  recordIntake: [...movementFields],
  recordOutbound: [oneOf('type', OUTBOUND_TYPES), ...movementFields],
} satisfies Record<string, ValidationChain[]>;

export type SchemaName = keyof typeof schemas;

export function toFieldErrors(req: Request): FieldErrors {
  const fields: FieldErrors = {};
  for (const error of validationResult(req).array()) {
    const key = error.type === 'field' ? error.path : '_';
    (fields[key] ??= []).push(String(error.msg));
  }
  return fields;
}

/**
 * Returns an Express middleware that runs the selected validation schema and
 * returns 400 with field-keyed messages if validation fails.
 */
export function validateRequest(schemaName: SchemaName) {
  const validators: ValidationChain[] = schemas[schemaName];

  return async (req: Request, res: Response, next: NextFunction) => {
    for (const validator of validators) {
      await validator.run(req);
    }

    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: toFieldErrors(req) });
    }

    return next();
  };
}

/** Body fields that passed the route's validation schema, sanitized. */
export function validated<T extends object>(req: Request): T {
  return matchedData<T>(req, { locations: ['body'], includeOptionals: false });
}
