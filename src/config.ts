import { z } from 'zod';

export const FormatOptionsSchema = z.object({
  separator: z.string().default(', '),
  prefix: z.string().default(''),
});

export type FormatOptions = z.infer<typeof FormatOptionsSchema>;
