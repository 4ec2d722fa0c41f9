export { CorruptedListError } from "./errors.ts";
export { IndexList } from "./index_list.ts";
export type { ForwardIter, BackwardIter, DrainIter } from "./iter.ts";
export {
  type Index,
  type IndexListOptions,
  indexesCompare,
  indexesEqual,
} from "./types.ts";
