/**
 * @module @deckwright/cli/config/schema
 * Schema of the YAML config file
 */

import { z } from 'zod';

export const DEFAULT_TITLE = 'Untitled Presentation';
export const DEFAULT_OUTPUT_FILE = 'index.html';

export const DeckConfigFileSchema = z
  .object({
    title: z.string().optional(),
    slide_dir: z.string().min(1).optional(),
    output_file: z.string().min(1),
    template_file: z.string().min(1),
    include_files: z.array(z.string().min(1)).optional(),
  })
  .strict()
  .refine(config => config.slide_dir !== undefined || (config.include_files?.length ?? 0) > 0, {
    message: 'slide_dir is required unless include_files lists the slides',
    path: ['slide_dir'],
  });

export type DeckConfigFile = z.infer<typeof DeckConfigFileSchema>;
