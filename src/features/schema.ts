import { z } from 'zod';

const featureOptionSchema = z
  .object({
    type: z.enum(['string', 'boolean', 'array']),
    default: z.unknown().optional(),
    description: z.string().optional(),
  })
  .passthrough();

/** Schema for a bundle's `devcontainer-feature.json`. */
export const featureMetadataSchema = z
  .object({
    id: z.string().min(1),
    version: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    options: z.record(featureOptionSchema).optional(),
  })
  .passthrough();
