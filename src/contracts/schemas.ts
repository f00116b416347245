import { z } from 'zod'

export const ChangeStatusSchema = z.enum(['added', 'modified', 'deleted'])

// Row schemas mirror the column names of src/records/schema.ts
export const CommitRowSchema = z.object({
  id: z.number().int(),
  commit_message: z.string(),
  time: z.string(),
})

export const FileRowSchema = z.object({
  id: z.number().int(),
  file_path: z.string(),
  file_hash: z.string(),
  tracked: z.number().int(),
})

export const ChronoRowSchema = z.object({
  id: z.number().int(),
  commit_id: z.number().int(),
  file_id: z.number().int(),
  status: ChangeStatusSchema,
  file_hash: z.string(),
  time: z.string(),
})

export const ChronoWithPathRowSchema = ChronoRowSchema.extend({
  file_path: z.string(),
})

export const CountRowSchema = z.object({
  count: z.number().int(),
})

export const StatusCountRowSchema = z.object({
  commit_id: z.number().int(),
  status: ChangeStatusSchema,
  count: z.number().int(),
})

export const ChronoConfigSchema = z.object({
  ignore: z.object({
    useDefaults: z.boolean().default(true),
    patterns: z.array(z.string()).default([]),
  }).default({
    useDefaults: true,
    patterns: [],
  }),
  log: z.object({
    defaultLimit: z.number().int().positive().default(10),
  }).default({
    defaultLimit: 10,
  }),
  backups: z.object({
    keepEmergency: z.number().int().nonnegative().default(5),
  }).default({
    keepEmergency: 5,
  }),
})

export type CommitRow = z.infer<typeof CommitRowSchema>
export type FileRow = z.infer<typeof FileRowSchema>
export type ChronoRow = z.infer<typeof ChronoRowSchema>
