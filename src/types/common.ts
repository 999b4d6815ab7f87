/**
 * Shared schema types for request body validation.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  maxLength?: number;
  min?: number;
  max?: number;
  /** Allowed values for string fields. */
  enum?: readonly string[];
  /** Element type for array fields. */
  items?: FieldType;
  /** Require an integer for number fields. */
  integer?: boolean;
}

export type BodySchema = Record<string, FieldSchema>;
