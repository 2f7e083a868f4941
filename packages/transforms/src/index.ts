/**
 * @docweave/transforms
 *
 * AST -> AST transforms: metadata, parameter validation, the registry and the
 * built-in set.
 */

export {
  AddConversionTimestampTransform,
  AddHeadingIdsTransform,
  BUILTIN_TRANSFORMS,
  CalculateWordCountTransform,
  DEFAULT_BOILERPLATE_PATTERNS,
  GenerateTocTransform,
  HeadingOffsetTransform,
  LinkRewriterTransform,
  RemoveBoilerplateTransform,
  RemoveImagesTransform,
  RemoveNodesTransform,
  TextReplacerTransform,
  slugify,
} from "./builtin";
export type { TimestampFormat, TocPosition } from "./builtin";
export {
  DEFAULT_TRANSFORM_PRIORITY,
  defineTransform,
  readBoolean,
  readNumber,
  readOptionalString,
  readString,
  readStringList,
  validateMetadata,
  validateParams,
} from "./metadata";
export type {
  ParameterSpec,
  ParameterType,
  ParameterValue,
  ScalarParameterType,
  ScalarValue,
  TransformDefinition,
  TransformMetadata,
  TransformParams,
  Transformer,
} from "./metadata";
export { TransformRegistry } from "./registry";
export type { TransformRegistryOptions } from "./registry";
