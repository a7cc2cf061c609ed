import { Knex } from 'knex';
import fs from 'fs';
import path from 'path';

interface SpeciesSeed {
  name: string;
  description: string;
  breeds: string[];
}

function loadSpecies(): SpeciesSeed[] {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, 'data', 'species.json'), 'utf8'));
  if (!Array.isArray(raw)) throw new Error('seeds/data/species.json must hold an array');
  return raw.map((entry: { name?: unknown; description?: unknown; breeds?: unknown }) => ({
    name: String(entry.name),
    description: typeof entry.description === 'string' ? entry.description : '',
    breeds: Array.isArray(entry.breeds) ? entry.breeds.map(String) : [],
  }));
}

export async function seed(knex: Knex): Promise<void> {
  let breeds = 0;

  for (const species of loadSpecies()) {
    const [row] = await knex('species')
      .insert({ name: species.name, description: species.description })
      .onConflict('name')
      .merge(['description'])
      .returning('id');

    for (const name of species.breeds) {
      await knex('breeds').insert({ species_id: row.id, name }).onConflict(['species_id', 'name']).ignore();
      breeds++;
    }
  }

  console.log(`[Seed] species and ${breeds} breeds loaded`);
}
