import { z } from 'zod';

export const publishVersionCommandSchema = z.object({
  versionName: z.string().trim().min(1),
  artifactPath: z.string().min(1),
  comment: z.string().default(''),
});

export type PublishVersionInput = z.input<typeof publishVersionCommandSchema>;

export type PublishVersionPayload = z.output<typeof publishVersionCommandSchema>;
