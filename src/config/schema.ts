import { z } from 'zod';

const portSchema = z.number().int().min(1024).max(65535);

export const TrackSchema = z
  .object({
    id: z.number().int().min(0),
    name: z.string().min(1),
    fields: z.array(z.string().min(1)).min(1),
    groupKeyFields: z.array(z.string().min(1)).min(1),
    textField: z.string().min(1),
  })
  .superRefine((track, ctx) => {
    const fields = new Set(track.fields);
    if (fields.size !== track.fields.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fields'], message: 'Field names must be unique' });
    }
    for (const key of track.groupKeyFields) {
      if (!fields.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['groupKeyFields'],
          message: `Group key field "${key}" is not one of the track's fields`,
        });
      }
    }
    if (!fields.has(track.textField)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['textField'],
        message: `Text field "${track.textField}" is not one of the track's fields`,
      });
    }
  });

export const PublishConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  timeoutMs: z.number().int().min(1000).default(30000),
  contention: z.enum(['wait', 'reject']).default('wait'),
  leaseWaitMs: z.number().int().min(0).optional(),
  leaseTtlMs: z.number().int().min(60000).default(10 * 60 * 1000),
  leaseDirectory: z.string().min(1).optional(),
});

export const PipelineConfigSchema = z
  .object({
    storeDirectory: z.string().min(1).default('data'),
    logDirectory: z.string().min(1).optional(),
    serverPort: portSchema.default(3000),
    aggregationChunkSize: z.number().int().min(1).default(1000),
    publish: PublishConfigSchema,
    tracks: z.array(TrackSchema).min(1),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<number>();
    for (const track of config.tracks) {
      if (seen.has(track.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['tracks'], message: `Duplicate track id ${track.id}` });
      }
      seen.add(track.id);
    }
  })
  .transform((config) => {
    // A waiter should outlast at least one full publish call
    const leaseWaitMs = config.publish.leaseWaitMs ?? config.publish.timeoutMs * 2;
    return {
      ...config,
      publish: {
        ...config.publish,
        leaseWaitMs,
        leaseDirectory: config.publish.leaseDirectory ?? `${config.storeDirectory}/leases`,
      },
    };
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type TrackConfig = z.infer<typeof TrackSchema>;
