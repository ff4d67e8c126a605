/**
 * dcm-inspect: DICOM metadata as a readable hierarchy
 *
 * Walks a decoded dataset and renders every element as
 * `(GGGG,EEEE) | Name | VR | Value`, nesting sequence items and eliding
 * pixel, waveform and other binary payloads.
 *
 * @module dcm-inspect
 */

/** Element model and records */
export type {
  BytesValue,
  DicomDataSet,
  DicomElement,
  ElementRecord,
  ElementValue,
  ItemRecord,
  MultiValue,
  NameResolver,
  PresentationSink,
  RecordStatus,
  ScalarValue,
  SequenceValue,
  Tag,
  ValueItem,
  ValueKind,
  ViewerRecord,
} from './core/types.js';
export {
  DecodeError,
  OptionsError,
  RenderError,
  StructuralError,
  createDecodeError,
  createStructuralError,
} from './core/errors.js';
export {
  DEFAULT_OPTIONS,
  ViewerOptionsSchema,
  resolveOptions,
  type ResolvedViewerOptions,
  type ViewerOptions,
} from './core/options.js';
/** Classification and formatting */
export { BINARY_VRS, isBinary, isBinaryVR, isBulkSampleTag, nonPrintableRatio, valueByteLength } from './core/binaryClassifier.js';
export {
  FIELD_SEPARATOR,
  MULTI_VALUE_SEPARATOR,
  UNRENDERABLE_VALUE,
  binaryPlaceholder,
  formatLabel,
  formatRecord,
  renderFullValue,
  renderValue,
  sequencePlaceholder,
  truncate,
} from './core/formatter.js';
/** Traversal */
export { assertDataSet, isDataSet, SEQUENCE_VR } from './core/validate.js';
export { walkDataSet, type WalkOptions } from './core/walker.js';
export { buildTree, renderLines, renderTree } from './view.js';
/** Sinks */
export { LineCollector, TextSink, createStreamSink, type LineWriter } from './sinks/textSink.js';
export { TreeSink, toLabelTree, type LabelTree, type TreeNode } from './sinks/treeSink.js';
export { renderTreeLines } from './sinks/treeRenderer.js';
/** Decoders */
export { concreteVR, decodePart10, hasPart10Preamble, TRANSFER_SYNTAX, type Part10DecodeOptions } from './decoders/part10.js';
export { decodeDicomJson } from './decoders/dicomJson.js';
/** Dictionary and tag utilities */
export {
  EMPTY_DICTIONARY,
  UNKNOWN_NAME,
  createDictionary,
  createNameResolver,
  displayName,
  loadStandardDictionary,
  lookupVR,
  type DictionaryEntry,
  type TagDictionary,
} from './utils/dictionary.js';
export {
  createTag,
  formatTag,
  isPrivateTag,
  isTag,
  normalizeTag,
  parseTag,
  tagKey,
} from './utils/tagUtils.js';
export { decodeString, SafeDataView } from './utils/SafeDataView.js';
