/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Server-Side Injection (Why a `<script>` Fragment)
 *
 * DEFINITION
 * 2. Payload Trust Boundary
 *
 * POLICY
 * 3. Script-Context Escaping
 * 4. Fail Before First Write
 *
 * STRATEGY
 * 5. Nested-Object Helper Registration
 * 6. Merge Assignment Semantics
 *
 * LIFECYCLE
 * 7. Chunked Output Discipline
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> POLICY -> STRATEGY -> LIFECYCLE
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - RATIONALE:
 *   Why a policy or strategy exists.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Server-Side Injection
 *
 * ---
 *
 * A page region renders data into the HTML response instead of letting the
 * browser fetch it later. The data lands under a dotted path on the global
 * object (`window.myApp.data`) before any page script runs.
 *
 * One invocation:
 *
 *   request -> validate -> target path -> fragment (prefix / suffix)
 *           -> payload (one adapter) -> prefix, payload chunks, suffix
 *
 * The emitted element:
 *
 * ```html
 * <script>
 * (function () {
 *   var createNestedObject = function (root, path) { ... };
 *   var container = createNestedObject(window, "myApp.data");
 *   var key = "data";
 *   ...
 *   Object.assign(container[key], {"empNo":7839});
 * })();
 * </script>
 * ```
 *
 * Everything except the payload is generated as an ESTree `Program` and
 * printed with `estree-util-to-js`, so the control code is always
 * syntactically whole.
 */
export type ServerSideInjection = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Payload Trust Boundary
 *
 * ---
 *
 * The payload is JSON text produced by a trusted source (a query the page
 * author wrote, a code block, or design-time text). It is written verbatim
 * as the second argument of `Object.assign`.
 *
 * Inside the boundary
 * -------------------
 * - Request fields and the target path: validated, and escaped wherever they
 *   reach emitted code.
 * - Control code: generated, never concatenated from user text.
 * - JSON the core serializes itself (`raw-query` rows, `JsonWriter` output):
 *   every string and member name goes through `quoteJsonString`, which
 *   writes `<`, `>`, `&`, U+2028 and U+2029 as `\uXXXX` escapes.
 *
 * Outside the boundary
 * --------------------
 * - Pre-serialized payload text (`json-query` cells, `static-json`): never
 *   parsed, re-serialized or escaped. A payload that is not a JSON value
 *   yields a script error at page load. Only an empty payload is rejected
 *   up front.
 *
 * Placement
 * ---------
 * The payload slot is a sentinel `Identifier` in the tree. After printing,
 * the code is split on it; the payload is streamed between the two halves
 * and never enters the AST.
 */
export type PayloadTrustBoundary = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Script-Context Escaping
 *
 * ---
 *
 * Every piece of user text placed in control code MUST be a string literal
 * that is inert in both parsing contexts it passes through.
 *
 * (A) HTML tokenizer
 *     The tokenizer ends a script element at `</script` regardless of JS
 *     syntax, and `<!--` changes its state.
 *     - `<`, `>`, `&` -> `\u003C`, `\u003E`, `\u0026`
 *     - `/`           -> `\/`
 *
 * (B) Script parser
 *     - `\`, quotes, control characters -> backslash escapes
 *     - U+2028 / U+2029                 -> `\u2028` / `\u2029`
 *     - Lone surrogates                 -> `\uXXXX`
 *
 * Literal nodes carry the escaped text as `raw`, which the printer emits
 * as-is.
 */
export type ScriptContextEscaping = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Fail Before First Write
 *
 * ---
 *
 * Validation, path parsing, fragment construction and payload production all
 * complete before the first byte goes to the page output.
 *
 * - Any error in those phases MUST leave the output untouched.
 * - Errors are never rendered into the page; they propagate to the host.
 * - Only a failing output stream can interrupt a fragment midway.
 */
export type FailBeforeFirstWrite = never;

/**
 * ARCHITECTURAL STRATEGY (5)
 * Nested-Object Helper Registration
 *
 * ---
 *
 * Each fragment needs a function that walks a dotted path, creating missing
 * intermediate objects, and returns the container of the leaf.
 *
 * (A) `scoped` (default)
 *     - Mechanism: `var createNestedObject = function (root, path) {...}`
 *                  inside the IIFE.
 *     - Effect:    Nothing is added to the global namespace.
 *
 * (B) `shared`
 *     - Mechanism: Defined once on the global root under a configurable name,
 *                  behind a `typeof … !== "function"` guard.
 *     - Effect:    Later fragments reuse the first definition.
 *
 * Both forms produce the same merge result.
 */
export type NestedObjectHelperPolicy = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Merge Assignment Semantics
 *
 * ---
 *
 * The payload is shallow-merged into the leaf with `Object.assign`.
 *
 * 1. Missing intermediates are created as `{}`. Existing objects and
 *    functions are reused; `null` or a primitive in between is replaced by `{}`.
 * 2. A leaf that is `null`, `undefined` or a primitive is replaced by `{}`
 *    before the merge.
 * 3. Top-level payload keys overwrite same-named keys on the leaf. Keys the
 *    payload does not mention survive.
 * 4. Nested objects are replaced, not deep-merged.
 * 5. An array payload contributes its indices as keys (`"0"`, `"1"`, ...),
 *    so a `raw-query` result lands as an index-keyed object on the leaf.
 *
 * Example:
 *
 *   window.myApp.data = { a: 1, keep: true }
 *   payload           = {"a":2,"b":3}
 *   result            = { a: 2, keep: true, b: 3 }
 */
export type MergeAssignmentSemantics = never;

/**
 * ARCHITECTURAL LIFECYCLE (7)
 * Chunked Output Discipline
 *
 * ---
 *
 * The page output may cap the size of a single write. The payload can be
 * arbitrarily large, so it is streamed.
 *
 * 1. `prefix` is written in one call.
 * 2. The payload is written in sequential slices of at most `chunkSize`
 *    UTF-16 code units, each write awaited before the next.
 * 3. A slice is shortened by one unit rather than split a surrogate pair.
 * 4. `suffix` is written in one call.
 *
 * Concatenating every write reproduces `prefix + payload + suffix` exactly.
 * `chunkSize` MUST be an integer >= 2.
 */
export type ChunkedOutputDiscipline = never;
