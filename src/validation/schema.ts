/**
 * Record validation.
 * Checks untrusted objects (provider replies, persisted rows, the command
 * table) against a field schema and narrows them on success.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  enum?: readonly string[];
  min?: number;
  max?: number;
}

export type RecordSchema = Record<string, FieldSchema>;

type FieldValue<F extends FieldSchema> = F['type'] extends 'string'
  ? F extends { enum: readonly (infer E)[] }
    ? E
    : string
  : F['type'] extends 'number'
    ? number
    : F['type'] extends 'boolean'
      ? boolean
      : F['type'] extends 'array'
        ? unknown[]
        : Record<string, unknown>;

/** The shape a value has once it passes `conforms(value, schema)`. */
export type Infer<S extends RecordSchema> = {
  [K in keyof S as S[K]['required'] extends true ? K : never]: FieldValue<S[K]>;
} & {
  [K in keyof S as S[K]['required'] extends true ? never : K]?: FieldValue<S[K]> | null;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate `value` against `schema`, pushing one message per problem into
 * `errors`. Returns true (and narrows) only when nothing was pushed.
 */
export function conforms<S extends RecordSchema>(
  value: unknown,
  schema: S,
  errors: string[] = []
): value is Infer<S> {
  if (!isRecord(value)) {
    errors.push('value must be an object');
    return false;
  }

  const found = validateFields(value, schema);
  errors.push(...found);
  return found.length === 0;
}

export function validateFields(
  body: Record<string, unknown>,
  schema: RecordSchema
): string[] {
  const errors: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema)) {
    const value = body[field];

    if (fieldSchema.required && (value === undefined || value === null)) {
      errors.push(`${field} is required`);
      continue;
    }

    if (value === undefined || value === null) {
      continue;
    }

    const typeError = checkType(field, value, fieldSchema);
    if (typeError) {
      errors.push(typeError);
      continue;
    }

    errors.push(...checkConstraints(field, value, fieldSchema));
  }

  return errors;
}

function checkType(
  field: string,
  value: unknown,
  schema: FieldSchema
): string | null {
  switch (schema.type) {
    case 'string':
      if (typeof value !== 'string') return `${field} must be a string`;
      break;
    case 'number':
      if (typeof value !== 'number' || Number.isNaN(value)) return `${field} must be a number`;
      break;
    case 'boolean':
      if (typeof value !== 'boolean') return `${field} must be a boolean`;
      break;
    case 'array':
      if (!Array.isArray(value)) return `${field} must be an array`;
      break;
    case 'object':
      if (!isRecord(value)) return `${field} must be an object`;
      break;
  }
  return null;
}

function checkConstraints(
  field: string,
  value: unknown,
  schema: FieldSchema
): string[] {
  const errors: string[] = [];

  if (schema.type === 'string' && typeof value === 'string') {
    if (schema.maxLength !== undefined && value.length > schema.maxLength) {
      errors.push(`${field} must be ${schema.maxLength} characters or less`);
    }
    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${field} must be one of: ${schema.enum.join(', ')}`);
    }
  }

  if (schema.type === 'number' && typeof value === 'number') {
    if (schema.min !== undefined && value < schema.min) {
      errors.push(`${field} must be at least ${schema.min}`);
    }
    if (schema.max !== undefined && value > schema.max) {
      errors.push(`${field} must be at most ${schema.max}`);
    }
  }

  return errors;
}
