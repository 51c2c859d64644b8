export {
  distributionSchema,
  type DistributionSpec,
} from './distributions'

export {
  transformSpecSchema,
  cropSizeSchema,
  cropAnchorSchema,
  type TransformSpec,
  type CropSizeSpec,
  type CropAnchorSpec,
} from './transforms'

export {
  pipelineSchema,
  type PipelineSpec,
} from './pipeline'
