import { z } from 'zod'
import { type DistributionSpec, distributionSchema } from './distributions'

export type CropSizeSpec =
  | { kind: 'fixed'; size: number[] }
  | { kind: 'ratio'; ratios: number[] }
  | { kind: 'divisible'; by: number; dims?: number; rounding?: 'ceil' | 'floor' }

export type CropAnchorSpec = 'center' | 'random' | 'origin' | { offsets: number[] }

/** Serialized form of a transform. `sequence` steps are composed in order. */
export type TransformSpec =
  | { type: 'identity' }
  | { type: 'scale-fixed'; sizes: number[] }
  | { type: 'scale-ratio'; ratios: number[] }
  | { type: 'scale-keep-aspect'; minLengths: number[] }
  | { type: 'rotate'; angle: number | DistributionSpec }
  | { type: 'reflect'; degrees: number }
  | { type: 'flip-x' }
  | { type: 'flip-y' }
  | { type: 'zoom'; scales: [number, number] | DistributionSpec }
  | { type: 'translate'; shifts: (number | [number, number])[] }
  | { type: 'pin-origin' }
  | { type: 'crop'; size: CropSizeSpec; anchor: CropAnchorSpec }
  | { type: 'crop-indices'; ranges: [number, number][] }
  | { type: 'center-resize-crop'; size: number[] }
  | { type: 'random-resize-crop'; size: number[] }
  | { type: 'resize-pad-divisible'; size: number[]; by: number }
  | { type: 'sequence'; steps: TransformSpec[] }
  | { type: 'one-of'; options: TransformSpec[]; weights?: number[] }
  | { type: 'maybe'; transform: TransformSpec; p?: number }

const sizeSchema = z.array(z.number().int().positive()).min(1)
const ratioSchema = z.array(z.number().finite().positive()).min(1)
const pairSchema = z.tuple([z.number().finite(), z.number().finite()])
const indexRangeSchema = z.tuple([z.number().int(), z.number().int()])

export const cropSizeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), size: sizeSchema }),
  z.object({ kind: z.literal('ratio'), ratios: ratioSchema }),
  z.object({
    kind: z.literal('divisible'),
    by: z.number().int().positive(),
    dims: z.number().int().positive().optional(),
    rounding: z.enum(['ceil', 'floor']).optional(),
  }),
])

export const cropAnchorSchema = z.union([
  z.enum(['center', 'random', 'origin']),
  z.object({ offsets: z.array(z.number().min(0).max(1)).min(1) }),
])

function cropDims(size: CropSizeSpec): number {
  switch (size.kind) {
    case 'fixed':
      return size.size.length
    case 'ratio':
      return size.ratios.length
    case 'divisible':
      return size.dims ?? 2
  }
}

/** Cross-field rules the per-field schemas cannot express. */
function refineTransform(spec: TransformSpec, ctx: z.RefinementCtx): void {
  const issue = (path: (string | number)[], message: string): void => {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message, path })
  }
  switch (spec.type) {
    case 'translate':
      spec.shifts.forEach((s, i) => {
        if (typeof s !== 'number' && s[0] > s[1]) issue(['shifts', i], 'range min must not exceed max')
      })
      return
    case 'zoom':
      if (!('kind' in spec.scales)) {
        const [min, max] = spec.scales
        if (!(min > 0)) issue(['scales', 0], 'scales must be positive')
        if (min > max) issue(['scales'], 'range min must not exceed max')
      }
      return
    case 'crop-indices':
      spec.ranges.forEach(([lo, hi], i) => {
        if (lo > hi) issue(['ranges', i], 'range start must not exceed its end')
      })
      return
    case 'crop':
      if (typeof spec.anchor === 'object' && spec.anchor.offsets.length !== cropDims(spec.size)) {
        issue(['anchor', 'offsets'], `expected ${cropDims(spec.size)} offsets, one per cropped axis`)
      }
      return
    case 'one-of':
      if (spec.weights === undefined) return
      if (spec.weights.length !== spec.options.length) issue(['weights'], 'weights must match options in length')
      else if (!(spec.weights.reduce((a, b) => a + b, 0) > 0)) issue(['weights'], 'weights must have a positive sum')
      return
    default:
      return
  }
}

export const transformSpecSchema: z.ZodType<TransformSpec> = z.lazy(() => z.discriminatedUnion('type', [
  z.object({ type: z.literal('identity') }),
  z.object({ type: z.literal('scale-fixed'), sizes: sizeSchema }),
  z.object({ type: z.literal('scale-ratio'), ratios: ratioSchema }),
  z.object({ type: z.literal('scale-keep-aspect'), minLengths: sizeSchema }),
  z.object({ type: z.literal('rotate'), angle: z.union([z.number().finite(), distributionSchema]) }),
  z.object({ type: z.literal('reflect'), degrees: z.number().finite() }),
  z.object({ type: z.literal('flip-x') }),
  z.object({ type: z.literal('flip-y') }),
  z.object({ type: z.literal('zoom'), scales: z.union([pairSchema, distributionSchema]) }),
  z.object({ type: z.literal('translate'), shifts: z.array(z.union([z.number().finite(), pairSchema])).min(1) }),
  z.object({ type: z.literal('pin-origin') }),
  z.object({ type: z.literal('crop'), size: cropSizeSchema, anchor: cropAnchorSchema }),
  z.object({ type: z.literal('crop-indices'), ranges: z.array(indexRangeSchema).min(1) }),
  z.object({ type: z.literal('center-resize-crop'), size: sizeSchema }),
  z.object({ type: z.literal('random-resize-crop'), size: sizeSchema }),
  z.object({ type: z.literal('resize-pad-divisible'), size: sizeSchema, by: z.number().int().positive() }),
  z.object({ type: z.literal('sequence'), steps: z.array(transformSpecSchema).min(1) }),
  z.object({
    type: z.literal('one-of'),
    options: z.array(transformSpecSchema).min(1),
    weights: z.array(z.number().finite().nonnegative()).optional(),
  }),
  z.object({ type: z.literal('maybe'), transform: transformSpecSchema, p: z.number().min(0).max(1).optional() }),
]).superRefine(refineTransform))
