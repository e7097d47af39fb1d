import { z } from 'zod';

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const gridSchema = z.object({
  columns: z
    .array(z.string().min(1, 'Column identifier must not be empty'))
    .refine((columns) => new Set(columns).size === columns.length, 'Column identifiers must be unique'),
  rows: z.array(z.record(z.string(), cellValueSchema)),
  firstRowNumber: z.number().int().positive().optional(),
});

export const columnSelectionSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('all') }),
  z.object({
    mode: z.literal('explicit'),
    columns: z.array(z.string().min(1)).min(1, 'Select at least one column'),
  }),
]);

export const verifyGridsInput = z.object({
  source: gridSchema,
  target: gridSchema,
  columns: columnSelectionSchema,
});

export const verifyWorkbooksInput = z.object({
  sourceBase64: z.string().min(1, 'Source workbook is required'),
  targetBase64: z.string().min(1, 'Target workbook is required'),
  sourceSheet: z.string().min(1).optional(),
  targetSheet: z.string().min(1).optional(),
  sourceFilename: z.string().optional(),
  targetFilename: z.string().optional(),
  columns: columnSelectionSchema.default({ mode: 'all' }),
});

export const workbookColumnsInput = verifyWorkbooksInput.omit({ columns: true });

export type VerifyGridsInput = z.infer<typeof verifyGridsInput>;
export type VerifyWorkbooksInput = z.infer<typeof verifyWorkbooksInput>;
export type WorkbookColumnsInput = z.infer<typeof workbookColumnsInput>;
