import { z } from 'zod'
import { transformSpecSchema } from './transforms'

export const pipelineSchema = z.object({
  name: z.string().min(1, 'Name is required').max(200).optional(),
  seed: z.number().int().nonnegative().optional(),
  transforms: z.array(transformSpecSchema).min(1, 'At least one transform is required'),
})

export type PipelineSpec = z.infer<typeof pipelineSchema>
