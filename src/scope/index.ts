export { VariableScope, type FrameKind } from "./variables.js";
export {
  assignScope,
  isTreeMap,
  keypathToString,
  parseScopePath,
  readCursor,
  resolveScope,
  type KeyCreatePolicy,
  type ResolveOptions,
  type ScopeCursor,
  type ScopeSegment,
  type TreeMap,
  type TreeValue,
  type WriteMode,
} from "./keypath.js";
