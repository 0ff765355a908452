export {
  Canonical,
  type CanonicalInit,
  DEFAULT_NAMESPACE,
  ErrUnknown,
  errorKey,
} from "./core/canonical"
export type { Chain } from "./core/chain"
export { classify, type ErrorVariant, errorText } from "./core/classify"
export {
  decodeCanonical,
  decodeGroup,
  ErrInvalidPayload,
  parseCanonical,
  parseGroup,
} from "./core/codec/decode"
export { Extras, type ExtrasInit } from "./core/extras"
export { Flags } from "./core/flags"
export {
  errorOrUndefined,
  formatGroupDefault,
  Group,
  type GroupFormatter,
  type GroupOptions,
  isEmpty,
} from "./core/group"
export { join } from "./core/join"
export { defineError } from "./core/utils/define-error"
export { errorChain, extract, matches, unwrap } from "./core/utils/inspect"
export type * from "./ports/error"
