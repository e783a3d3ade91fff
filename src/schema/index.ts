import { z } from 'zod';

export const TaskStatusSchema = z.enum(['DONE', 'IN-PROGRESS', 'BLOCKED', 'TODO']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const PrioritySchema = z.number().int().min(1).max(5);
export type Priority = z.infer<typeof PrioritySchema>;

export const NONE = 'none';
export type NoneSentinel = typeof NONE;

export const ExporterNameSchema = z.enum(['calendar', 'simple', 'full', 'plain']);
export type ExporterName = z.infer<typeof ExporterNameSchema>;

// Accepts the spellings the CLI allows for boolean options.
export const BooleanOptionSchema = z
  .union([z.boolean(), z.enum(['1', '0', 'true', 'false', 'yes', 'no'])])
  .transform((value) => value === true || value === '1' || value === 'true' || value === 'yes');

export const ExportOptionsSchema = z
  .object({
    summary: BooleanOptionSchema.default(true),
    fold: BooleanOptionSchema.default(false),
    color: BooleanOptionSchema.default(false),
  })
  .strict();
export type ExportOptions = z.infer<typeof ExportOptionsSchema>;
export type ExportOptionsInput = z.input<typeof ExportOptionsSchema>;

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = ExportOptionsSchema.parse({});
