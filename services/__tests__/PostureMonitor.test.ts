/**
 * Tests for the posture monitor frame loop
 */

import { PostureMonitor } from '../PostureMonitor';
import type { PostureUpdate } from '../PostureMonitor';
import { ErrorHandler } from '../ErrorHandler';
import { SETTINGS_STORAGE_KEY, createSettingsStore } from '../../store/settingsStore';
import type { SettingsStoreApi } from '../../store/settingsStore';
import { RegionCode } from '../../types/posture';
import { SkeletonTrackingState } from '../../types/skeleton';
import {
  CROSS_POSE,
  TEST_CONFIG,
  armsLevelHeights,
  armsSnapshot,
  buildSkeleton,
  framePayload,
} from '../../test/fixtures';

const CROSS_FRAME = framePayload([
  buildSkeleton({ trackingId: 3, joints: CROSS_POSE }),
  buildSkeleton({ trackingId: 8, trackingState: SkeletonTrackingState.POSITION_ONLY }),
]);

const BOTH_BELOW = { armsCode: RegionCode.BELOW, legCode: RegionCode.BELOW };

describe('PostureMonitor', () => {
  let clock: number;
  let store: SettingsStoreApi;
  let monitor: PostureMonitor;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    clock = 0;
    store = createSettingsStore();
    store.setState(TEST_CONFIG);
    monitor = new PostureMonitor({
      settingsStore: store,
      errorHandler: new ErrorHandler({ now: () => clock }),
    });
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe('processFrame', () => {
    it('should classify tracked skeletons and plan an overlay for each skeleton', () => {
      const update = monitor.processFrame(CROSS_FRAME);

      expect(update?.timestamp).toBe(1000);
      expect(update?.results).toEqual([{ trackingId: 3, classification: BOTH_BELOW }]);
      expect(update?.overlays.map((overlay) => overlay.trackingId)).toEqual([3, 8]);
      expect(update?.overlays[0].bones.some((bone) => bone.region === 'leg')).toBe(true);
      expect(update?.overlays[1].centerPoint?.color).toBe('#0000FF');
    });

    it('should read the settings store on every frame', () => {
      monitor.processFrame(CROSS_FRAME);
      store.getState().setTargetLegAngle(95);

      const update = monitor.processFrame(CROSS_FRAME);

      expect(update?.results[0].classification).toEqual({
        armsCode: RegionCode.BELOW,
        legCode: RegionCode.INVALID,
      });
      expect(update?.overlays[0].bones.some((bone) => bone.region === 'leg')).toBe(false);
    });

    it('should pair each overlay with its own skeleton when tracking ids repeat', () => {
      const raised = armsSnapshot(armsLevelHeights(0.4, 1.0));
      const level = armsSnapshot(armsLevelHeights(0.4, 0.4));

      const update = monitor.processFrame(
        framePayload([
          buildSkeleton({ trackingId: 1, joints: raised }),
          buildSkeleton({ trackingId: 1, joints: level }),
        ])
      );

      expect(update?.results.map((result) => result.classification.armsCode)).toEqual([
        RegionCode.CORRECT,
        RegionCode.BELOW,
      ]);
      const armsColors = update?.overlays.map(
        (overlay) => overlay.bones.find((bone) => bone.region === 'arms')?.pen.color
      );
      expect(armsColors).toEqual(['#008000', '#FFFF00']);
    });

    it('should classify with numeric settings even when storage holds strings', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const entries = new Map<string, string>([
        [
          SETTINGS_STORAGE_KEY,
          JSON.stringify({
            state: { targetLegAngleDegrees: 10, toleranceFactor: '0.05', requireTrackedJoints: false },
            version: 0,
          }),
        ],
      ]);
      const persisted = new PostureMonitor({
        settingsStore: createSettingsStore({
          getItem: (name) => entries.get(name) ?? null,
          setItem: (name, value) => {
            entries.set(name, value);
          },
          removeItem: (name) => {
            entries.delete(name);
          },
        }),
      });

      const update = persisted.processFrame(
        framePayload([buildSkeleton({ joints: armsSnapshot(armsLevelHeights(0.4, 1.0)) })])
      );

      expect(update?.results[0].classification.armsCode).toBe(RegionCode.CORRECT);
      warnSpy.mockRestore();
    });

    it('should reject an unreadable frame and log it', () => {
      expect(monitor.processFrame({ skeletons: [] })).toBeNull();

      expect(monitor.getSummary().framesRejected).toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        '[PostureMonitor]',
        'invalid_payload',
        'Invalid skeleton frame: timestamp: Required',
        'parseSkeletonFrame'
      );
    });

    it('should return null without counting anything while disabled', () => {
      monitor.setEnabled(false);

      expect(monitor.isEnabled()).toBe(false);
      expect(monitor.processFrame(CROSS_FRAME)).toBeNull();
      expect(monitor.getSummary().framesProcessed).toBe(0);
    });
  });

  describe('error recovery', () => {
    const failFrames = (count: number) => {
      for (let i = 0; i < count; i++) {
        monitor.processFrame('not a frame');
      }
    };

    it('should keep classifying after a short run of bad frames', () => {
      failFrames(3);

      expect(monitor.processFrame(CROSS_FRAME)?.results).toHaveLength(1);
    });

    it('should drop frames once the error handler disables the monitor', () => {
      failFrames(5);
      clock = 10_000;

      expect(monitor.processFrame(CROSS_FRAME)).toBeNull();
      expect(monitor.getSummary()).toMatchObject({
        framesProcessed: 0,
        framesRejected: 5,
        framesDropped: 1,
      });
    });

    it('should resume after the recovery interval', () => {
      failFrames(5);
      clock = 30_000;

      expect(monitor.processFrame(CROSS_FRAME)?.results).toEqual([
        { trackingId: 3, classification: BOTH_BELOW },
      ]);
    });
  });

  describe('subscribers', () => {
    it('should publish each update to every subscriber until it unsubscribes', () => {
      const received: PostureUpdate[] = [];
      const unsubscribe = monitor.subscribe((update) => received.push(update));

      const first = monitor.processFrame(CROSS_FRAME);
      unsubscribe();
      monitor.processFrame(CROSS_FRAME);

      expect(received).toEqual([first]);
    });

    it('should keep publishing when one subscriber throws', () => {
      const failure = new Error('render failed');
      const received: number[] = [];
      monitor.subscribe(() => {
        throw failure;
      });
      monitor.subscribe((update) => received.push(update.timestamp));

      monitor.processFrame(CROSS_FRAME);

      expect(received).toEqual([1000]);
      expect(errorSpy).toHaveBeenCalledWith('[PostureMonitor] Listener failed:', failure);
    });

    it('should not publish rejected frames', () => {
      const listener = jest.fn();
      monitor.subscribe(listener);

      monitor.processFrame({ timestamp: -5, skeletons: [] });

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('summary', () => {
    it('should count region codes across frames', () => {
      monitor.processFrame(CROSS_FRAME);
      monitor.processFrame(CROSS_FRAME);
      monitor.processFrame(framePayload([buildSkeleton()], 2000));

      const summary = monitor.getSummary();

      expect(summary.framesProcessed).toBe(3);
      expect(summary.arms[RegionCode.BELOW]).toBe(2);
      expect(summary.arms[RegionCode.CORRECT]).toBe(1);
      expect(summary.leg[RegionCode.BELOW]).toBe(2);
      expect(summary.leg[RegionCode.INCORRECT]).toBe(1);
    });

    it('should count a frame with no tracked skeletons as processed', () => {
      monitor.processFrame(framePayload([]));

      expect(monitor.getSummary()).toEqual({
        framesProcessed: 1,
        framesRejected: 0,
        framesDropped: 0,
        arms: { [-1]: 0, 0: 0, 1: 0, 2: 0, 3: 0 },
        leg: { [-1]: 0, 0: 0, 1: 0, 2: 0, 3: 0 },
      });
    });

    it('should hand out copies of the counters', () => {
      monitor.processFrame(CROSS_FRAME);
      const summary = monitor.getSummary();
      summary.arms[RegionCode.BELOW] = 99;

      expect(monitor.getSummary().arms[RegionCode.BELOW]).toBe(1);
    });

    it('should clear counters and error state on reset', () => {
      monitor.processFrame(CROSS_FRAME);
      monitor.processFrame(null);
      monitor.reset();

      expect(monitor.getSummary()).toMatchObject({
        framesProcessed: 0,
        framesRejected: 0,
        framesDropped: 0,
      });
      expect(monitor.getSummary().arms[RegionCode.BELOW]).toBe(0);
    });
  });
});
