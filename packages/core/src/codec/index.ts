export { serializeValue, deserializeValue, kindOf, isAttrValue } from './value-codec.js';
export type { AttrValue, AttrMap, AttrValueKind, SerializedValue } from './value-codec.js';
