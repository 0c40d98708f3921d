import type { FailBeforeFirstWrite } from './architecture';
import { producePayload } from './adapters';
import {
  DEFAULT_CHUNK_SIZE,
  DEFAULT_SHARED_HELPER_NAME
} from './emitter/constants';
import {
  buildScriptFragment,
  emitFragment,
  parseTargetPath,
  type EmitResult
} from './emitter';
import {
  ConfigurationError,
  ContractViolationError,
  LoadJsonObjectError,
  getErrorMessage
} from './errors';
import { isNonBlankString, isValidChunkSize } from './guards';
import { createLogger } from './logger';
import { validateInjectionRequest } from './request-validator';
import type {
  GlobalRoot,
  HelperRegistration,
  InjectionSource,
  LoaderOptions,
  NullValuePolicy,
  RenderContext,
  ResolvedLoaderOptions
} from './types';

const GLOBAL_ROOTS: readonly GlobalRoot[] = ['window', 'globalThis', 'self'];
const HELPER_REGISTRATIONS: readonly HelperRegistration[] = ['scoped', 'shared'];
const NULL_VALUE_POLICIES: readonly NullValuePolicy[] = [
  'null',
  'empty-string',
  'omit'
];

function assertOneOf<T extends string>(
  name: string,
  value: T,
  allowed: readonly T[]
): T {
  if (!allowed.includes(value)) {
    throw new ConfigurationError(
      `Invalid option "${name}": ${String(value)}. Use ${allowed.join(' | ')}.`,
      { details: { option: name, value } }
    );
  }
  return value;
}

/**
 * Applies defaults and rejects invalid option values up front.
 *
 * @throws ConfigurationError
 */
export function resolveLoaderOptions(
  options: LoaderOptions = {}
): ResolvedLoaderOptions {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!isValidChunkSize(chunkSize)) {
    throw new ConfigurationError(
      `Invalid option "chunkSize": ${chunkSize}. Expected an integer of at least 2.`,
      { details: { option: 'chunkSize', value: chunkSize } }
    );
  }

  const sharedHelperName =
    options.sharedHelperName ?? DEFAULT_SHARED_HELPER_NAME;
  if (!isNonBlankString(sharedHelperName)) {
    throw new ConfigurationError(
      'Invalid option "sharedHelperName": expected a non-empty name.'
    );
  }

  const { maxSourceLength } = options;
  if (
    maxSourceLength !== undefined &&
    !(Number.isInteger(maxSourceLength) && maxSourceLength > 0)
  ) {
    throw new ConfigurationError(
      `Invalid option "maxSourceLength": ${maxSourceLength}. Expected a positive integer.`,
      { details: { option: 'maxSourceLength', value: maxSourceLength } }
    );
  }

  return {
    dataSource: options.dataSource,
    codeBlockExecutor: options.codeBlockExecutor,
    logger:
      options.logger ??
      createLogger({ level: 'warn', component: 'load-json-object' }),
    globalRoot: assertOneOf(
      'globalRoot',
      options.globalRoot ?? 'window',
      GLOBAL_ROOTS
    ),
    chunkSize,
    helperRegistration: assertOneOf(
      'helperRegistration',
      options.helperRegistration ?? 'scoped',
      HELPER_REGISTRATIONS
    ),
    sharedHelperName,
    allowNonIdentifierSegments: options.allowNonIdentifierSegments ?? false,
    nullValues: assertOneOf(
      'nullValues',
      options.nullValues ?? 'null',
      NULL_VALUE_POLICIES
    ),
    maxSourceLength
  };
}

export type LoadResult = EmitResult & {
  source: InjectionSource;
  targetPath: string;
};

export interface JsonObjectLoader {
  readonly options: ResolvedLoaderOptions;

  /**
   * Runs one injection and appends its `<script>` fragment to
   * `render.output`.
   *
   * Phases
   * ------
   * 1. Validate the request.
   * 2. Parse the target path.
   * 3. Build the control fragment.
   * 4. Produce the payload through the adapter selected by `source`.
   * 5. Write prefix, payload chunks and suffix.
   *
   * Phases 1-4 finish before anything is written; see
   * {@link FailBeforeFirstWrite}.
   */
  load(request: unknown, render: RenderContext): Promise<LoadResult>;
}

export function createJsonObjectLoader(
  options: LoaderOptions = {}
): JsonObjectLoader {
  const resolved = resolveLoaderOptions(options);
  const { logger } = resolved;

  async function load(
    input: unknown,
    render: RenderContext
  ): Promise<LoadResult> {
    try {
      const request = validateInjectionRequest(input, {
        maxSourceLength: resolved.maxSourceLength
      });

      const target = parseTargetPath(request.targetPath, {
        allowNonIdentifierSegments: resolved.allowNonIdentifierSegments
      });

      logger.debug('Loading JSON object', {
        source: request.source,
        targetPath: target.path
      });

      const fragment = buildScriptFragment(target, {
        globalRoot: resolved.globalRoot,
        helperRegistration: resolved.helperRegistration,
        sharedHelperName: resolved.sharedHelperName,
        scriptNonce: render.scriptNonce
      });

      const payload = await producePayload(request, {
        dataSource: resolved.dataSource,
        codeBlockExecutor: resolved.codeBlockExecutor,
        binds: render.binds ?? {},
        nullValues: resolved.nullValues,
        logger
      });

      if (payload.trim().length === 0) {
        throw new ContractViolationError(
          `The "${request.source}" source produced an empty payload.`,
          { details: { source: request.source } }
        );
      }

      const result = await emitFragment(
        render.output,
        fragment,
        payload,
        resolved.chunkSize
      );

      logger.debug('Emitted JSON object', {
        targetPath: target.path,
        payloadLength: payload.length,
        chunks: result.payloadWrites
      });

      return { ...result, source: request.source, targetPath: target.path };
    } catch (error) {
      logger.error('Failed to load JSON object', {
        code: error instanceof LoadJsonObjectError ? error.code : 'UNKNOWN',
        error: getErrorMessage(error)
      });
      throw error;
    }
  }

  return { options: resolved, load };
}

/**
 * One-shot form of {@link createJsonObjectLoader}.
 *
 * @example
 * ```ts
 * const output = createBufferedOutput();
 * await loadJsonObject(
 *   { source: 'static-json', staticText: '{"a":1}', targetPath: 'myApp.data' },
 *   { output }
 * );
 * ```
 */
export function loadJsonObject(
  request: unknown,
  render: RenderContext,
  options?: LoaderOptions
): Promise<LoadResult> {
  return createJsonObjectLoader(options).load(request, render);
}
