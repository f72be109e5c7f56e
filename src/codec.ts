import { z } from 'zod';
import { GestureRequest, toGesturePayload } from './gestures';
import { FormatError, ProtocolError } from './types';
import { TestServerRequest } from './utils/http';

export const ROUTES = {
  action: '/',
  map: 'map',
  gesture: 'gesture',
  ping: 'ping',
  ready: 'ready',
  kill: 'kill',
} as const;

// Method references passed to a map operation
export type MethodRef =
  | { readonly type: 'named'; readonly name: string }
  | { readonly type: 'parameterized'; readonly name: string; readonly arguments: readonly unknown[] };

export type WireMethodRef = string | { method_name: string; arguments: unknown[] };

export interface ActionEnvelope {
  command: string;
  arguments: unknown[];
}

export interface MapEnvelope {
  query: string;
  operation: {
    method_name: string;
    arguments: WireMethodRef[];
  };
}

function checkMethodName(name: string, source: unknown): string {
  if (name.length === 0) {
    throw new FormatError('INVALID_METHOD_REF', `Cannot map '${describe(source)}'. Method name is empty.`, {
      value: source,
    });
  }
  return name;
}

export function namedCall(name: string): MethodRef {
  return Object.freeze({ type: 'named', name: checkMethodName(name, name) });
}

export function parameterizedCall(name: string, args: readonly unknown[]): MethodRef {
  return Object.freeze({
    type: 'parameterized',
    name: checkMethodName(name, { [name]: args }),
    arguments: Object.freeze([...args]),
  });
}

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Converts untyped input into a method reference: a bare name, or an object
 * with exactly one key whose value is the argument (or argument list).
 */
export function toMethodRef(value: unknown): MethodRef {
  if (typeof value === 'string') {
    return namedCall(value);
  }

  if (isPlainObject(value)) {
    const keys = Object.keys(value);
    if (keys.length > 1) {
      throw new FormatError(
        'INVALID_METHOD_REF',
        `Cannot map '${describe(value)}'. More than one key (method name) is not allowed.`,
        { value }
      );
    }
    if (keys.length === 0) {
      throw new FormatError(
        'INVALID_METHOD_REF',
        `Cannot map '${describe(value)}'. No key (method name) is given.`,
        { value }
      );
    }

    const name = keys[0];
    const argument = value[name];
    return parameterizedCall(name, Array.isArray(argument) ? argument : [argument]);
  }

  throw new FormatError(
    'INVALID_METHOD_REF',
    `Invalid value for map: '${describe(value)}' (${typeName(value)})`,
    { value, type: typeName(value) }
  );
}

function toWireMethodRef(ref: MethodRef): WireMethodRef {
  return ref.type === 'named'
    ? ref.name
    : { method_name: ref.name, arguments: [...ref.arguments] };
}

function jsonRequest(route: string, envelope: unknown): TestServerRequest {
  return { route, params: { json: JSON.stringify(envelope) } };
}

export function encodeActionRequest(action: string, args: readonly unknown[]): TestServerRequest {
  const envelope: ActionEnvelope = { command: action, arguments: [...args] };
  return jsonRequest(ROUTES.action, envelope);
}

export function encodeMapRequest(
  query: string,
  methodName: string,
  methodRefs: readonly MethodRef[]
): TestServerRequest {
  const envelope: MapEnvelope = {
    query,
    operation: {
      method_name: methodName,
      arguments: methodRefs.map(toWireMethodRef),
    },
  };
  return jsonRequest(ROUTES.map, envelope);
}

export function encodeGestureRequest(request: GestureRequest): TestServerRequest {
  return jsonRequest(ROUTES.gesture, toGesturePayload(request));
}

const ActionResponseSchema = z
  .object({
    success: z.unknown(),
    message: z.unknown().optional(),
  })
  .passthrough();

const OutcomeResponseSchema = z
  .object({
    outcome: z.unknown(),
    reason: z.unknown().optional(),
    details: z.unknown().optional(),
    results: z.unknown().optional(),
  })
  .passthrough();

export type ActionResult = z.infer<typeof ActionResponseSchema>;

function parseBody<T extends z.ZodTypeAny>(body: string, schema: T, route: string): z.infer<T> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(body);
  } catch (error) {
    throw new ProtocolError('MALFORMED_RESPONSE', `Could not parse '${route}' response: ${body}`, {
      route,
      body,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = schema.safeParse(decoded);
  if (!parsed.success) {
    throw new ProtocolError('MALFORMED_RESPONSE', `Unexpected '${route}' response: ${body}`, {
      route,
      body,
      issues: parsed.error.issues.map(issue => issue.message),
    });
  }
  return parsed.data;
}

function textOf(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value : describe(value);
}

export function decodeActionResponse(body: string, action: string): ActionResult {
  const result = parseBody(body, ActionResponseSchema, ROUTES.action);

  if (!result.success) {
    throw new ProtocolError('ACTION_FAILED', textOf(result.message), {
      action,
      message: result.message,
    });
  }

  return result;
}

export function decodeMapResponse(body: string, query: string, methodName: string): unknown {
  const result = parseBody(body, OutcomeResponseSchema, ROUTES.map);

  if (result.outcome !== 'SUCCESS') {
    throw new ProtocolError(
      'MAP_FAILED',
      `mapping "${query}" with "${methodName}" failed because: ${textOf(result.reason)}\n${textOf(result.details)}`,
      { query, methodName, reason: result.reason, details: result.details }
    );
  }

  return result.results;
}

export function decodeGestureResponse(body: string): void {
  const result = parseBody(body, OutcomeResponseSchema, ROUTES.gesture);

  if (result.outcome !== 'SUCCESS') {
    throw new ProtocolError('GESTURE_FAILED', `Failed to perform gesture. ${textOf(result.reason)}`, {
      reason: result.reason,
    });
  }
}
