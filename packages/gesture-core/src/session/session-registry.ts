import {
  type GestureConfig,
  assertValidGestureConfig,
  cloneGestureConfig,
} from "../config/gesture-config";
import type { FeatureFrame } from "../types/features";
import type { GestureEvent } from "../types/gesture";
import { type FrameResult, SessionDetector } from "./session-detector";

export type SessionRegistryOptions = {
  config: GestureConfig;
  onGesture?: (sessionId: string, event: GestureEvent) => void;
};

/**
 * One SessionDetector per live client session. Sessions never share
 * detector state; closing a session drops it immediately.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionDetector>();

  private readonly config: GestureConfig;

  private readonly onGesture?: (sessionId: string, event: GestureEvent) => void;

  constructor(options: SessionRegistryOptions) {
    assertValidGestureConfig(options.config);
    this.config = cloneGestureConfig(options.config);
    this.onGesture = options.onGesture;
  }

  get size(): number {
    return this.sessions.size;
  }

  open(sessionId: string): SessionDetector {
    if (this.sessions.has(sessionId)) {
      throw new Error(`Session ${sessionId} is already open`);
    }

    const { onGesture } = this;
    const detector = new SessionDetector({
      config: this.config,
      onGesture: onGesture ? (event) => onGesture(sessionId, event) : undefined,
    });
    this.sessions.set(sessionId, detector);
    return detector;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): SessionDetector | undefined {
    return this.sessions.get(sessionId);
  }

  process(sessionId: string, frame: FeatureFrame): FrameResult {
    return this.require(sessionId).process(frame);
  }

  reset(sessionId: string): void {
    this.require(sessionId).reset();
  }

  close(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  closeAll(): void {
    this.sessions.clear();
  }

  getConfig(): GestureConfig {
    return cloneGestureConfig(this.config);
  }

  private require(sessionId: string): SessionDetector {
    const detector = this.sessions.get(sessionId);
    if (!detector) {
      throw new Error(`Unknown session ${sessionId}`);
    }
    return detector;
  }
}
