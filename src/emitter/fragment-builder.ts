import type { Expression, Program, Statement } from 'estree';
import { toJs } from 'estree-util-to-js';

import type {
  NestedObjectHelperPolicy,
  MergeAssignmentSemantics,
  PayloadTrustBoundary
} from '../architecture';
import { ConfigurationError } from '../errors';
import type { GlobalRoot, HelperRegistration } from '../types/options';

import { PAYLOAD_SENTINEL_BASE, HELPER_NAMES } from './constants';
import {
  assign,
  binary,
  call,
  dot,
  expressionStatement,
  forStatement,
  functionExpression,
  identifier,
  ifStatement,
  increment,
  index,
  logical,
  nullLiteral,
  numberLiteral,
  returnStatement,
  stringLiteral,
  typeOf,
  varDeclaration
} from './estree-builders';
import { escapeHtmlAttribute } from './script-literal';
import type { TargetPath } from './target-path';

export type FragmentOptions = {
  globalRoot: GlobalRoot;
  helperRegistration: HelperRegistration;
  sharedHelperName: string;
  scriptNonce?: string;
};

/**
 * The control fragment split around the payload position.
 *
 * `prefix` starts with the opening `<script>` tag and ends right before the
 * payload argument; `suffix` closes the merge call, the isolated scope and the
 * element. The full fragment is `prefix + payload + suffix`.
 */
export type ScriptFragment = {
  readonly prefix: string;
  readonly suffix: string;
};

/**
 * `slot` holds `null` or a primitive, so it cannot take properties.
 */
function isNotMergeable(slot: () => Expression): Expression {
  return logical(
    '||',
    binary('===', slot(), nullLiteral()),
    logical(
      '&&',
      binary('!==', typeOf(slot()), stringLiteral('object')),
      binary('!==', typeOf(slot()), stringLiteral('function'))
    )
  );
}

/**
 * Builds the nested-object helper:
 *
 * ```js
 * function (root, path) {
 *   var segments = path.split(".");
 *   for (var i = 0; i < segments.length - 1; i++) {
 *     var segment = segments[i];
 *     if (root[segment] === null || typeof root[segment] !== "object" && typeof root[segment] !== "function") {
 *       root[segment] = {};
 *     }
 *     root = root[segment];
 *   }
 *   return root;
 * }
 * ```
 *
 * The returned value is the container that holds the leaf segment.
 */
function buildNestedObjectHelper(): Expression {
  const { root, path, segments, i, segment } = HELPER_NAMES;
  const rootAtSegment = () => index(identifier(root), identifier(segment));

  return functionExpression(
    [root, path],
    [
      varDeclaration(
        segments,
        call(dot(identifier(path), 'split'), [stringLiteral('.')])
      ),
      forStatement(
        varDeclaration(i, numberLiteral(0)),
        binary(
          '<',
          identifier(i),
          binary('-', dot(identifier(segments), 'length'), numberLiteral(1))
        ),
        increment(identifier(i)),
        [
          varDeclaration(segment, index(identifier(segments), identifier(i))),
          ifStatement(isNotMergeable(rootAtSegment), [
            expressionStatement(
              assign(rootAtSegment(), { type: 'ObjectExpression', properties: [] })
            )
          ]),
          expressionStatement(assign(identifier(root), rootAtSegment()))
        ]
      ),
      returnStatement(identifier(root))
    ]
  );
}

/**
 * Statements that bind the local helper name, per {@link NestedObjectHelperPolicy}.
 */
function buildHelperBinding(options: FragmentOptions): Statement[] {
  if (options.helperRegistration === 'scoped') {
    return [varDeclaration(HELPER_NAMES.helper, buildNestedObjectHelper())];
  }

  const sharedSlot = () =>
    index(identifier(options.globalRoot), stringLiteral(options.sharedHelperName));

  return [
    ifStatement(
      binary('!==', typeOf(sharedSlot()), stringLiteral('function')),
      [expressionStatement(assign(sharedSlot(), buildNestedObjectHelper()))]
    ),
    varDeclaration(HELPER_NAMES.helper, sharedSlot())
  ];
}

/**
 * Builds the merge statements, per {@link MergeAssignmentSemantics}:
 *
 * ```js
 * var container = createNestedObject(window, "myApp.data");
 * var key = "data";
 * if (container[key] === null || typeof container[key] !== "object" && typeof container[key] !== "function") {
 *   container[key] = {};
 * }
 * Object.assign(container[key], PAYLOAD);
 * ```
 */
function buildMergeStatements(
  target: TargetPath,
  options: FragmentOptions,
  sentinel: string
): Statement[] {
  const { container, key, helper } = HELPER_NAMES;
  const leafSlot = () => index(identifier(container), identifier(key));

  return [
    varDeclaration(
      container,
      call(identifier(helper), [
        identifier(options.globalRoot),
        stringLiteral(target.path)
      ])
    ),
    varDeclaration(key, stringLiteral(target.leaf)),
    ifStatement(isNotMergeable(leafSlot), [
      expressionStatement(
        assign(leafSlot(), { type: 'ObjectExpression', properties: [] })
      )
    ]),
    expressionStatement(
      call(dot(identifier('Object'), 'assign'), [
        leafSlot(),
        identifier(sentinel)
      ])
    )
  ];
}

/**
 * Picks a payload placeholder name that cannot occur inside any emitted
 * string literal.
 *
 * Escape sequences never produce `_` or `$`, so the placeholder can only
 * reappear in the printed code if the raw user text contains it; extending
 * the name until no user text contains it makes the split unambiguous.
 */
function choosePayloadSentinel(userTexts: readonly string[]): string {
  let sentinel = PAYLOAD_SENTINEL_BASE;
  while (userTexts.some(text => text.includes(sentinel))) {
    sentinel += '$';
  }
  return sentinel;
}

function buildOpeningTag(scriptNonce: string | undefined): string {
  return scriptNonce === undefined
    ? '<script>'
    : `<script nonce="${escapeHtmlAttribute(scriptNonce)}">`;
}

/**
 * Builds the control fragment for one injection.
 *
 * Pipeline
 * --------
 * 1. Compose an ESTree `Program` holding a single IIFE.
 * 2. Put a sentinel `Identifier` where the payload argument goes.
 * 3. Print with `estree-util-to-js`.
 * 4. Split the printed code on the sentinel into `prefix` / `suffix`.
 *
 * The payload itself never enters the tree; see {@link PayloadTrustBoundary}.
 *
 * @throws ConfigurationError if the printed code does not contain the
 *   sentinel exactly once.
 */
export function buildScriptFragment(
  target: TargetPath,
  options: FragmentOptions
): ScriptFragment {
  const sentinel = choosePayloadSentinel([
    target.path,
    options.sharedHelperName
  ]);

  const iife = call(
    functionExpression(
      [],
      [
        ...buildHelperBinding(options),
        ...buildMergeStatements(target, options, sentinel)
      ]
    ),
    []
  );

  const program: Program = {
    type: 'Program',
    sourceType: 'script',
    body: [expressionStatement(iife)]
  };

  const code = toJs(program).value.trimEnd();
  const parts = code.split(sentinel);
  const [head, tail] = parts;

  if (parts.length !== 2 || head === undefined || tail === undefined) {
    throw new ConfigurationError(
      `Could not place the payload for target path "${target.path}".`,
      { details: { occurrences: parts.length - 1 } }
    );
  }

  return {
    prefix: `${buildOpeningTag(options.scriptNonce)}\n${head}`,
    suffix: `${tail}\n</script>\n`
  };
}
