import * as Option from "effect/Option"

import type { Method, OpenRpcDocument, Reference } from "./openrpc.js"

// CHANGE: let consumers tell reference nodes apart and look methods up by name
// WHY: references are kept as decoded; resolving them is the caller's job
// REF: req-references-1
// PURITY: CORE
// INVARIANT: isReference(x) ⇔ x carries a $ref key
// COMPLEXITY: O(1) / O(n) for findMethod

export const isReference = <A extends object>(value: A | Reference): value is Reference => "$ref" in value

/** First method with the given name; names are unique in a well-formed document. */
export const findMethod = (document: OpenRpcDocument, name: string): Option.Option<Method> =>
  Option.fromNullable(document.methods.find((method) => method.name === name))
