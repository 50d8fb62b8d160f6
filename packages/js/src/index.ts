export { PackedStore, type StoreWriter } from "./store";
export { Matrix, type MatrixOptions, type Position } from "./matrix";
export {
  MatrixError,
  isMatrixError,
  normalizeError,
  parseErrorString,
  type MatrixErrorCode,
} from "./errors";
export {
  bigintArithmetic,
  naturalOrder,
  numberArithmetic,
  sameValue,
  type Arithmetic,
  type Compare,
} from "./arithmetic";
export {
  foldLeft,
  foldLeftWhile,
  foldRight,
  map,
  proceed,
  sparseFoldLeft,
  sparseFoldLeftWhile,
  sparseFoldRight,
  sparseMap,
  stop,
  type FoldFn,
  type MapFn,
  type Step,
  type StepFn,
} from "./traversal";
export {
  argmax,
  argmin,
  find,
  locate,
  max,
  member,
  min,
  sum,
  sumWith,
  trace,
  traceWith,
} from "./aggregate";
export {
  column,
  concat,
  diagonal,
  dropColumn,
  dropRow,
  flipLR,
  flipUD,
  identity,
  identityWith,
  row,
  transpose,
  type Axis,
} from "./transform";
export {
  add,
  addWith,
  dot,
  dotWith,
  multiplyElementwise,
  multiplyElementwiseWith,
} from "./linalg";
export {
  MatrixSequence,
  collect,
  halt,
  next,
  suspend,
  zip,
  type Continuation,
  type ReduceResult,
  type Reducer,
  type Sequence,
  type Signal,
} from "./sequence";
export {
  formatMatrix,
  getOutputFormat,
  resetOutputFormat,
  scopedOutputFormat,
  setOutputFormat,
  withOutputFormat,
  type OutputFormat,
} from "./format";
export {
  readArchive,
  readMatrix,
  writeArchive,
  writeMatrix,
  type ArchiveValue,
  type NamedMatrix,
} from "./io/archive";
