import { FormatError, Point } from './types';

export interface PointGesture {
  readonly kind: 'tap' | 'double_tap';
  readonly at: Readonly<Point>;
  readonly offset: Readonly<Point>;
  readonly durationMs: number;
}

export interface SwipeGesture {
  readonly kind: 'swipe';
  readonly from: Readonly<Point>;
  readonly to: Readonly<Point>;
  readonly durationMs: number;
  readonly flick: boolean;
}

export type GestureDescriptor = PointGesture | SwipeGesture;

/** A gesture bound to the element it targets, ready for dispatch. */
export interface GestureRequest {
  readonly gesture: GestureDescriptor;
  readonly queryString: string;
  readonly timeoutMs: number;
}

export interface GesturePayload {
  query_string: string;
  timeout: number;
  gesture:
    | { type: 'tap' | 'double_tap'; x: number; y: number; offset: Point; time: number }
    | { type: 'swipe'; from: Point; to: Point; time: number; flick: boolean };
}

export const GESTURE_TIMEOUT_MARGIN_MS = 10000;

const NO_OFFSET: Readonly<Point> = Object.freeze({ x: 0, y: 0 });

function checkPoint(name: string, point: Point): Readonly<Point> {
  if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
    throw new FormatError('INVALID_GESTURE', `Invalid ${name} coordinate: (${point.x}, ${point.y})`, {
      [name]: point,
    });
  }
  return Object.freeze({ x: point.x, y: point.y });
}

function checkDuration(durationMs: number): number {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    throw new FormatError('INVALID_GESTURE', `Invalid gesture duration: ${durationMs}`, {
      durationMs,
    });
  }
  return durationMs;
}

function pointGesture(
  kind: PointGesture['kind'],
  at: Point,
  offset: Point | undefined,
  durationMs: number
): PointGesture {
  return Object.freeze({
    kind,
    at: checkPoint('at', at),
    offset: offset ? checkPoint('offset', offset) : NO_OFFSET,
    durationMs: checkDuration(durationMs),
  });
}

function swipeGesture(from: Point, to: Point, durationMs: number, flick: boolean): SwipeGesture {
  return Object.freeze({
    kind: 'swipe',
    from: checkPoint('from', from),
    to: checkPoint('to', to),
    durationMs: checkDuration(durationMs),
    flick,
  });
}

export function tap(at: Point, offset?: Point, durationMs = 0): PointGesture {
  return pointGesture('tap', at, offset, durationMs);
}

export function doubleTap(at: Point, offset?: Point): PointGesture {
  return pointGesture('double_tap', at, offset, 0);
}

// A long press is a tap that holds
export function longPress(at: Point, offset: Point | undefined, durationMs: number): PointGesture {
  return tap(at, offset, durationMs);
}

export function swipe(from: Point, to: Point, durationMs: number): SwipeGesture {
  return swipeGesture(from, to, durationMs, false);
}

export function flick(from: Point, to: Point, durationMs: number): SwipeGesture {
  return swipeGesture(from, to, durationMs, true);
}

export function withParameters(
  gesture: GestureDescriptor,
  parameters: { queryString: string; timeoutMs: number }
): GestureRequest {
  if (!Number.isFinite(parameters.timeoutMs) || parameters.timeoutMs < 0) {
    throw new FormatError('INVALID_GESTURE', `Invalid gesture timeout: ${parameters.timeoutMs}`, {
      timeoutMs: parameters.timeoutMs,
    });
  }

  return Object.freeze({
    gesture,
    queryString: parameters.queryString,
    timeoutMs: parameters.timeoutMs,
  });
}

/** Time the harness may spend finding the element and performing the gesture. */
export function gestureRequestTimeoutMs(request: GestureRequest): number {
  return request.timeoutMs + request.gesture.durationMs + GESTURE_TIMEOUT_MARGIN_MS;
}

export function toGesturePayload(request: GestureRequest): GesturePayload {
  const { gesture } = request;
  const payloadGesture: GesturePayload['gesture'] =
    gesture.kind === 'swipe'
      ? {
          type: 'swipe',
          from: { ...gesture.from },
          to: { ...gesture.to },
          time: gesture.durationMs,
          flick: gesture.flick,
        }
      : {
          type: gesture.kind,
          x: gesture.at.x,
          y: gesture.at.y,
          offset: { ...gesture.offset },
          time: gesture.durationMs,
        };

  return {
    query_string: request.queryString,
    timeout: request.timeoutMs,
    gesture: payloadGesture,
  };
}
