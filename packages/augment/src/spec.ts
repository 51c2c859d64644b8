/**
 * Build transforms from serialized pipeline descriptions.
 */

import { type PipelineSpec, type TransformSpec, pipelineSchema, transformSpecSchema } from '@warpkit/shared'
import type { ZodError } from 'zod'
import { compose, maybe, oneOf, sequence } from './compose'
import { PipelineSpecError, WarpkitError } from './errors'
import { centerResizeCrop, randomResizeCrop, resizePadDivisible } from './presets'
import { Crop, CropIndices } from './projective/crop'
import { PinOrigin } from './projective/pin-origin'
import { Reflect, Rotate, flipX, flipY } from './projective/rotate'
import { ScaleFixed, ScaleKeepAspect, ScaleRatio } from './projective/scale'
import { Translate } from './projective/translate'
import { Zoom } from './projective/zoom'
import { type Rng, createRng } from './random'
import { IDENTITY, type Transform } from './transform'

export interface BuiltPipeline {
  readonly name?: string
  readonly seed?: number
  readonly transform: Transform
  /** Seeded source when the spec carries a seed. */
  readonly rng?: Rng
}

type Path = readonly (string | number)[]

function formatPath(path: Path): string {
  return path.join('.') || '(root)'
}

function issuesOf(error: ZodError): string[] {
  return error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`)
}

function construct(spec: TransformSpec, path: Path): Transform {
  switch (spec.type) {
    case 'identity':
      return IDENTITY
    case 'scale-fixed':
      return new ScaleFixed(spec.sizes)
    case 'scale-ratio':
      return new ScaleRatio(spec.ratios)
    case 'scale-keep-aspect':
      return new ScaleKeepAspect(spec.minLengths)
    case 'rotate':
      return new Rotate(spec.angle)
    case 'reflect':
      return new Reflect(spec.degrees)
    case 'flip-x':
      return flipX()
    case 'flip-y':
      return flipY()
    case 'zoom':
      return new Zoom(spec.scales)
    case 'translate':
      return new Translate(spec.shifts)
    case 'pin-origin':
      return new PinOrigin()
    case 'crop':
      return new Crop(spec.size, spec.anchor)
    case 'crop-indices':
      return new CropIndices(spec.ranges)
    case 'center-resize-crop':
      return centerResizeCrop(spec.size)
    case 'random-resize-crop':
      return randomResizeCrop(spec.size)
    case 'resize-pad-divisible':
      return resizePadDivisible(spec.size, spec.by)
    case 'sequence':
      return sequence(spec.steps.map((s, i) => buildTransform(s, [...path, 'steps', i])))
    case 'one-of':
      return oneOf(spec.options.map((o, i) => buildTransform(o, [...path, 'options', i])), spec.weights)
    case 'maybe':
      return maybe(buildTransform(spec.transform, [...path, 'transform']), spec.p)
  }
}

/**
 * Construct the transform a spec describes. Constructor errors are
 * reported as PipelineSpecError issues at `path`.
 */
export function buildTransform(spec: TransformSpec, path: Path = []): Transform {
  try {
    return construct(spec, path)
  } catch (err) {
    if (err instanceof PipelineSpecError || !(err instanceof WarpkitError)) throw err
    throw new PipelineSpecError([`${formatPath(path)}: ${err.message}`])
  }
}

/** Validate one serialized transform and build it. */
export function parseTransform(input: unknown): Transform {
  const result = transformSpecSchema.safeParse(input)
  if (!result.success) throw new PipelineSpecError(issuesOf(result.error))
  return buildTransform(result.data)
}

/**
 * Validate a serialized pipeline and compose its transforms in order.
 * Throws PipelineSpecError listing every issue found.
 */
export function buildPipeline(input: unknown): BuiltPipeline {
  const result = pipelineSchema.safeParse(input)
  if (!result.success) throw new PipelineSpecError(issuesOf(result.error))
  const spec: PipelineSpec = result.data
  const [first, ...rest] = spec.transforms.map((t, i) => buildTransform(t, ['transforms', i]))
  return {
    name: spec.name,
    seed: spec.seed,
    transform: compose(first, ...rest),
    rng: spec.seed === undefined ? undefined : createRng(spec.seed),
  }
}
