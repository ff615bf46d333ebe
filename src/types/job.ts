// Render job descriptor handed over by the host when a job finishes.

import { z } from 'zod';

export const RenderJobStatusSchema = z.preprocess(
  (value) => {
    if (typeof value !== 'string') return value;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'complete') return 'Complete';
    if (normalized === 'failed') return 'Failed';
    return value;
  },
  z.enum(['Complete', 'Failed']),
);

export type RenderJobStatus = z.infer<typeof RenderJobStatusSchema>;

export const RenderJobResultSchema = z.object({
  projectName: z.string().trim().min(1),
  timelineName: z.string().trim().min(1),
  outputFilename: z.string().trim().min(1),
  status: RenderJobStatusSchema,
  errorDetail: z.string().optional(),
});

export type RenderJobResult = z.infer<typeof RenderJobResultSchema>;
