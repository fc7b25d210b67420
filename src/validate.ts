import { Ajv, type ErrorObject, type Schema, type ValidateFunction } from 'ajv';
import { createRequire } from 'node:module';
import { MalformedRowError } from './errors.js';

export interface RawInventoryRow {
  item_id: string | number;
  item_name: string;
  container_id: string | number;
  container_name: string;
  augments?: string;
  count?: string | number;
  item_name_log?: string;
}

const require = createRequire(import.meta.url);
const ajv = new Ajv({ allErrors: false, strict: false });

let rowValidator: ValidateFunction<RawInventoryRow> | undefined;

function loadRowValidator(): ValidateFunction<RawInventoryRow> {
  if (!rowValidator) {
    const schema: Schema = require('../schemas/inventory_row.json');
    rowValidator = ajv.compile<RawInventoryRow>(schema);
  }
  return rowValidator;
}

function describeFailure(error: ErrorObject): { field: string; detail: string } {
  if (error.keyword === 'required') {
    const missing = error.params.missingProperty;
    return { field: typeof missing === 'string' ? missing : 'row', detail: 'is required' };
  }
  const field = error.instancePath.replace(/^\//, '') || 'row';
  if (error.keyword === 'pattern' || error.keyword === 'minimum') {
    return { field, detail: field === 'count' ? 'must be a positive integer' : 'must be an integer' };
  }
  return { field, detail: error.message ?? 'is invalid' };
}

export function assertInventoryRow(
  row: unknown,
  rowNumber: number,
  source?: string
): asserts row is RawInventoryRow {
  const validate = loadRowValidator();
  if (validate(row)) return;
  const [first] = validate.errors ?? [];
  const { field, detail } = first ? describeFailure(first) : { field: 'row', detail: 'is invalid' };
  throw new MalformedRowError(rowNumber, field, detail, source);
}
