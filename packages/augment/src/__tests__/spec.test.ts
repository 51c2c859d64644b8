import { describe, test, expect } from 'vitest'
import {
  PipelineSpecError,
  buildPipeline,
  buildTransform,
  describe as describeTransform,
  parseTransform,
} from '../index'

function issuesOf(fn: () => unknown): readonly string[] {
  try {
    fn()
  } catch (err) {
    if (err instanceof PipelineSpecError) return err.issues
    throw err
  }
  throw new Error('expected a PipelineSpecError')
}

describe('buildPipeline', () => {
  test('composes the listed transforms in order', () => {
    const built = buildPipeline({
      name: 'train',
      seed: 3,
      transforms: [
        { type: 'rotate', angle: 10 },
        { type: 'center-resize-crop', size: [32, 32] },
      ],
    })
    expect(built.name).toBe('train')
    expect(built.seed).toBe(3)
    expect(built.rng).toBeDefined()
    expect(describeTransform(built.transform)).toBe(
      'Sequence(Cropped(Composed(Rotate(-10..10), ScaleKeepAspect(32x32)), Crop(32x32, center)) |> PinOrigin)',
    )
  })

  test('a seeded pipeline reproduces its draws', () => {
    const spec = { seed: 11, transforms: [{ type: 'rotate', angle: 30 }] }
    const a = buildPipeline(spec).rng
    const b = buildPipeline(spec).rng
    expect(a?.()).toBe(b?.())
  })

  test('rejects an empty pipeline', () => {
    expect(() => buildPipeline({ transforms: [] })).toThrow(PipelineSpecError)
  })

  test('rejects unknown transform types', () => {
    expect(issuesOf(() => buildPipeline({ transforms: [{ type: 'shear' }] }))[0]).toMatch(/^transforms\.0\.type: /)
  })

  test('rejects mismatched weights at any depth', () => {
    expect(issuesOf(() => buildPipeline({
      transforms: [{ type: 'one-of', options: [{ type: 'flip-x' }], weights: [1, 2] }],
    }))).toEqual(['transforms.0.weights: weights must match options in length'])

    expect(issuesOf(() => buildPipeline({
      transforms: [{
        type: 'sequence',
        steps: [{ type: 'one-of', options: [{ type: 'flip-x' }], weights: [1, 2] }],
      }],
    }))).toEqual(['transforms.0.steps.0.weights: weights must match options in length'])
  })
})

describe('parseTransform', () => {
  test('builds single transforms', () => {
    expect(describeTransform(parseTransform({ type: 'flip-y' }))).toBe('Reflect(90)')
    expect(describeTransform(parseTransform({
      type: 'crop',
      size: { kind: 'divisible', by: 8, rounding: 'floor' },
      anchor: 'origin',
    }))).toBe('Crop(divisible by 8 (floor), origin)')
    expect(describeTransform(parseTransform({ type: 'maybe', transform: { type: 'flip-x' }, p: 0.25 })))
      .toBe('Maybe(Reflect(180), p=0.25)')
  })

  test('reports constraint violations as spec issues', () => {
    expect(issuesOf(() => parseTransform({ type: 'translate', shifts: [[3, 1]] })))
      .toEqual(['shifts.0: range min must not exceed max'])
    expect(issuesOf(() => parseTransform({ type: 'zoom', scales: [0, 1] })))
      .toEqual(['scales.0: scales must be positive'])
    expect(issuesOf(() => parseTransform({ type: 'zoom', scales: [2, 1] })))
      .toEqual(['scales: range min must not exceed max'])
    expect(issuesOf(() => parseTransform({ type: 'one-of', options: [{ type: 'flip-x' }], weights: [0] })))
      .toEqual(['weights: weights must have a positive sum'])
    expect(issuesOf(() => parseTransform({ type: 'crop-indices', ranges: [[5, 1], [0, 1]] })))
      .toEqual(['ranges.0: range start must not exceed its end'])
    expect(issuesOf(() => parseTransform({
      type: 'crop',
      size: { kind: 'fixed', size: [4, 4] },
      anchor: { offsets: [0.5] },
    }))).toEqual(['anchor.offsets: expected 2 offsets, one per cropped axis'])
  })

  test('rejects fractional crop indices', () => {
    const issues = issuesOf(() => parseTransform({ type: 'crop-indices', ranges: [[0.5, 3], [0, 1]] }))
    expect(issues[0]).toMatch(/^ranges\.0\.0: /)
  })

  test('rejects a reversed uniform distribution', () => {
    expect(() => parseTransform({ type: 'rotate', angle: { kind: 'uniform', min: 5, max: 1 } }))
      .toThrow(PipelineSpecError)
  })
})

describe('buildTransform', () => {
  test('constructor failures become spec issues at their path', () => {
    expect(issuesOf(() => buildTransform({ type: 'translate', shifts: [[3, 1]] })))
      .toEqual(['(root): Translate: range 3..1 is reversed'])
    expect(issuesOf(() => buildTransform({
      type: 'sequence',
      steps: [{ type: 'flip-x' }, { type: 'crop-indices', ranges: [[0.5, 3], [0, 1]] }],
    }))).toEqual(['steps.1: CropIndices: ranges must be integer indices, got 0.5:3, 0:1'])
  })
})
