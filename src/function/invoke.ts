import { classify, canonicalMime, lookupContentType } from '../codec/content-type.js';
import { decode, encode } from '../codec/coerce.js';
import { CoercionError } from '../codec/errors.js';
import { CodecRegistry } from '../codec/registry.js';
import { Decodable, Encodable } from '../codec/shapes.js';
import { HeaderMap, RuntimeContext } from './context.js';

export const FDK_VERSION = 'fn-coerce/0.1.0';
export const CALL_PATH = '/call';

export type FunctionHandler<I, O> = (ctx: RuntimeContext, input: I) => O | Promise<O>;

export interface FunctionShapes<I, O> {
  input: Decodable<I>;
  output: Encodable<O>;
}

export interface FunctionCall {
  method: string;
  path: string;
  headers: HeaderMap;
  body: Uint8Array;
}

export interface CallResult {
  status: number;
  headers: Record<string, string>;
  body: Uint8Array;
  error?: string; // machine-readable code, also in the JSON body
}

export interface InvokeOptions {
  strictContentType?: boolean;
  codecs?: CodecRegistry;
  config?: Record<string, string | undefined>;
}

export function errorResult(status: number, error: string, message: string): CallResult {
  return {
    status,
    headers: { 'content-type': 'application/json', 'fn-fdk-version': FDK_VERSION },
    body: Buffer.from(JSON.stringify({ error, message }), 'utf8'),
    error
  };
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs one invocation: classify the request content type, decode the body,
 * call the handler, encode its result for the response type.
 */
export async function handleCall<I, O>(
  call: FunctionCall,
  handler: FunctionHandler<I, O>,
  shapes: FunctionShapes<I, O>,
  options: InvokeOptions = {}
): Promise<CallResult> {
  if (call.method !== 'POST' || call.path.split('?')[0] !== CALL_PATH) {
    return errorResult(404, 'not_found', `no route for ${call.method} ${call.path}`);
  }

  const ctHeader = call.headers['content-type'];
  const mime = (Array.isArray(ctHeader) ? ctHeader[0] : ctHeader) || '';
  if (options.strictContentType && lookupContentType(mime) === undefined) {
    return errorResult(415, 'unsupported_content_type', `unsupported content type: ${mime || '(none)'}`);
  }

  const ctx = new RuntimeContext({ headers: call.headers, requestType: classify(mime), config: options.config });

  let input: I;
  try {
    input = decode(ctx.requestType, call.body, shapes.input, options.codecs);
  } catch (err) {
    if (err instanceof CoercionError) return errorResult(400, 'decode_error', err.message);
    throw err;
  }

  let output: O;
  try {
    output = await handler(ctx, input);
  } catch (err) {
    return errorResult(502, 'function_error', messageOf(err));
  }

  let body: Uint8Array;
  try {
    body = encode(ctx.responseType, output, shapes.output, options.codecs);
  } catch (err) {
    if (err instanceof CoercionError) return errorResult(500, 'encode_error', err.message);
    throw err;
  }

  return {
    status: 200,
    headers: {
      ...ctx.getResponseHeaders(),
      'content-type': canonicalMime(ctx.responseType),
      'fn-fdk-version': FDK_VERSION
    },
    body
  };
}
