import knex from 'knex';
import { types } from 'pg';
import knexConfig from '../knexfile';

// NUMERIC and BIGINT (count/sum) come back as strings by default
types.setTypeParser(1700, (value) => parseFloat(value));
types.setTypeParser(20, (value) => parseInt(value, 10));
// DATE stays a plain YYYY-MM-DD string, no timezone shift
types.setTypeParser(1082, (value) => value);

const db = knex(knexConfig);

export default db;
