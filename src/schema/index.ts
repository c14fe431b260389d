import { z } from 'zod';

/** Backend timestamp, always UTC: 20240131T174501Z */
export const STAMP_REGEX = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;

export const StampSchema = z.string().regex(STAMP_REGEX, 'Expected a YYYYMMDDTHHMMSSZ timestamp');
export type Stamp = z.infer<typeof StampSchema>;

export const StatusSchema = z.enum(['pending', 'completed', 'deleted', 'waiting', 'recurring']);
export type Status = z.infer<typeof StatusSchema>;

export const COLOR_LABELS = ['red', 'green', 'blue'] as const;
export const ColorLabelSchema = z.enum(COLOR_LABELS);
export type ColorLabel = z.infer<typeof ColorLabelSchema>;

export const SortModeSchema = z.enum(['urgency', 'date', 'color']);
export type SortMode = z.infer<typeof SortModeSchema>;

export const ASSIGNEE_SIGIL = '@';
export const DISPUTED_LABEL = 'disputed';

// Unknown backend fields (annotations, UDAs, ...) pass through so an import
// writes back everything the export gave us.
export const ItemSchema = z
  .object({
    uuid: z.string().optional(),
    id: z.number().optional(),
    xid: z.string().optional(),
    description: z.string().default(''),
    project: z.string().optional(),
    status: StatusSchema,
    entry: StampSchema.optional(),
    end: StampSchema.optional(),
    modified: StampSchema.optional(),
    reviewed: StampSchema.optional(),
    urgency: z.number().optional(),
    tags: z.array(z.string()).optional(),
  })
  .passthrough();
export type Item = z.infer<typeof ItemSchema>;

export const ItemListSchema = z.array(ItemSchema);

export const KeybindingFileSchema = z.object({
  version: z.literal(1),
  contexts: z.record(z.string(), z.record(z.string(), z.string().min(1))),
});
export type KeybindingFile = z.infer<typeof KeybindingFileSchema>;
