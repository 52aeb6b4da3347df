/**
 * Terminology document format.
 *
 * A terminology lists reference properties: the normative definition, type,
 * unit and dependency that documents using the term should follow.
 */

import { z } from 'zod';
import { ValueTypeSchema } from '../odml/valueTypes.js';

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const TerminologyPropertySchema = z.object({
  name: z.string().min(1),
  definition: z.string().optional(),
  type: z.string().transform(tag => tag.trim().toLowerCase()).pipe(ValueTypeSchema).optional(),
  unit: z.string().optional(),
  dependency: z.string().optional(),
  dependencyValue: ScalarSchema.transform(value => String(value)).optional(),
  /** Explicit mapping; defaults to "<baseUri>#<name>" */
  mapping: z.string().url().optional(),
  values: z.array(ScalarSchema).optional(),
}).strict();

export const TerminologyDocumentSchema = z.object({
  terminologyVersion: z.literal(1),
  name: z.string().min(1),
  baseUri: z.string().url().optional(),
  properties: z.array(TerminologyPropertySchema),
}).strict();

export type TerminologyPropertyEntry = z.infer<typeof TerminologyPropertySchema>;
export type TerminologyDocument = z.infer<typeof TerminologyDocumentSchema>;

/**
 * Raised for a terminology document that cannot be used.
 */
export class TerminologyLoadError extends Error {
  constructor(
    message: string,
    public readonly source: string
  ) {
    super(`Terminology '${source}': ${message}`);
    this.name = 'TerminologyLoadError';
  }
}
