import {
  doubleTap,
  flick,
  gestureRequestTimeoutMs,
  longPress,
  swipe,
  tap,
  toGesturePayload,
  withParameters,
} from '../../src/gestures';
import { FormatError } from '../../src/types';

describe('gestures', () => {
  describe('point gestures', () => {
    it('should build a tap with zero offset and duration by default', () => {
      expect(tap({ x: 50, y: 50 })).toEqual({
        kind: 'tap',
        at: { x: 50, y: 50 },
        offset: { x: 0, y: 0 },
        durationMs: 0,
      });
    });

    it('should keep the offset of a double tap', () => {
      expect(doubleTap({ x: 10, y: 20 }, { x: 5, y: -5 })).toEqual({
        kind: 'double_tap',
        at: { x: 10, y: 20 },
        offset: { x: 5, y: -5 },
        durationMs: 0,
      });
    });

    it('should represent a long press as a tap that holds', () => {
      const gesture = longPress({ x: 50, y: 50 }, undefined, 1500);

      expect(gesture.kind).toBe('tap');
      expect(gesture.durationMs).toBe(1500);
    });

    it('should reject non-finite coordinates and negative durations', () => {
      expect(() => tap({ x: Number.NaN, y: 0 })).toThrow(FormatError);
      expect(() => longPress({ x: 0, y: 0 }, undefined, -1)).toThrow('Invalid gesture duration: -1');
    });

    it('should freeze descriptors', () => {
      const gesture = tap({ x: 1, y: 2 });

      expect(Object.isFrozen(gesture)).toBe(true);
      expect(Object.isFrozen(gesture.at)).toBe(true);
    });

    it('should not share the caller point object', () => {
      const point = { x: 1, y: 2 };
      const gesture = tap(point);
      point.x = 99;

      expect(gesture.at).toEqual({ x: 1, y: 2 });
    });
  });

  describe('swipe gestures', () => {
    it('should differ between swipe and flick only by the flick flag', () => {
      const plain = swipe({ x: 0, y: 0 }, { x: 100, y: 50 }, 200);
      const fast = flick({ x: 0, y: 0 }, { x: 100, y: 50 }, 200);

      expect(plain).toEqual({
        kind: 'swipe',
        from: { x: 0, y: 0 },
        to: { x: 100, y: 50 },
        durationMs: 200,
        flick: false,
      });
      expect(fast).toEqual({ ...plain, flick: true });
    });
  });

  describe('withParameters', () => {
    it('should bind a reusable gesture to different queries', () => {
      const gesture = tap({ x: 50, y: 50 });

      const first = withParameters(gesture, { queryString: "button marked:'OK'", timeoutMs: 5000 });
      const second = withParameters(gesture, { queryString: 'textView', timeoutMs: 1000 });

      expect(first.gesture).toBe(gesture);
      expect(second.gesture).toBe(gesture);
      expect(first.queryString).toBe("button marked:'OK'");
      expect(second.queryString).toBe('textView');
      expect(Object.isFrozen(first)).toBe(true);
    });

    it('should reject a negative timeout', () => {
      expect(() => withParameters(tap({ x: 0, y: 0 }), { queryString: '*', timeoutMs: -5 })).toThrow(
        'Invalid gesture timeout: -5'
      );
    });
  });

  describe('dispatch helpers', () => {
    it('should add the element timeout, duration and margin', () => {
      const request = withParameters(swipe({ x: 0, y: 0 }, { x: 100, y: 50 }, 200), {
        queryString: '*',
        timeoutMs: 3000,
      });

      expect(gestureRequestTimeoutMs(request)).toBe(13200);
    });

    it('should serialise point gestures', () => {
      const request = withParameters(longPress({ x: 40, y: 60 }, { x: 2, y: 3 }, 800), {
        queryString: 'button',
        timeoutMs: 1000,
      });

      expect(toGesturePayload(request)).toEqual({
        query_string: 'button',
        timeout: 1000,
        gesture: { type: 'tap', x: 40, y: 60, offset: { x: 2, y: 3 }, time: 800 },
      });
    });

    it('should serialise swipes with the flick flag', () => {
      const request = withParameters(flick({ x: 0, y: 0 }, { x: 10, y: 20 }, 300), {
        queryString: 'list',
        timeoutMs: 0,
      });

      expect(toGesturePayload(request)).toEqual({
        query_string: 'list',
        timeout: 0,
        gesture: { type: 'swipe', from: { x: 0, y: 0 }, to: { x: 10, y: 20 }, time: 300, flick: true },
      });
    });
  });
});
