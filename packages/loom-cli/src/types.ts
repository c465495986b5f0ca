import { z } from 'zod';
import { PRIORITIES } from 'loom-core';

export const OutputFormatSchema = z.enum(['text', 'json']);

export const GlobalOptionsSchema = z
  .object({
    root: z.string().optional(),
    author: z.string().optional(),
    branch: z.string().optional(),
    format: OutputFormatSchema.default('text'),
    json: z.boolean().optional(),
  })
  .transform((value) => {
    const format = value.json ? 'json' : value.format;
    return {
      root: value.root,
      author: value.author,
      branch: value.branch,
      format,
      json: format === 'json',
    };
  });

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export const ConfigFileSchema = z
  .object({
    rootPath: z.string(),
    defaultAuthor: z.string().min(1),
    defaultPriority: z.enum(PRIORITIES),
    archiveAfterDays: z.number().int().positive(),
  })
  .partial();

export type Config = z.infer<typeof ConfigFileSchema>;
