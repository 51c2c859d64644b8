import { z } from 'zod'

export type DistributionSpec =
  | { kind: 'uniform'; min: number; max: number }
  | { kind: 'constant'; value: number }
  | { kind: 'choice'; values: number[] }
  | { kind: 'normal'; mean: number; std: number }

const finite = z.number().finite()

export const distributionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('uniform'), min: finite, max: finite }),
  z.object({ kind: z.literal('constant'), value: finite }),
  z.object({ kind: z.literal('choice'), values: z.array(finite).min(1) }),
  z.object({ kind: z.literal('normal'), mean: finite, std: finite.nonnegative() }),
]).superRefine((dist, ctx) => {
  if (dist.kind === 'uniform' && dist.min > dist.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'min must not exceed max', path: ['min'] })
  }
})
