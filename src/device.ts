/**
 * The device session the engine drives. One session per step run, owned by
 * the caller and passed into every component.
 */

import { errorMessage } from "./errors.js";
import type { DispatchResult, ResolvedAction, ScreenSize } from "./types.js";

export interface DeviceSession {
  /** Raw UI hierarchy dump. */
  snapshot(): Promise<string>;
  /** Captures the screen and returns the local image path. */
  screenshot(): Promise<string>;
  screenSize(): Promise<ScreenSize>;
  /** One attempt; retries are the dispatcher's job. */
  dispatch(action: ResolvedAction): Promise<DispatchResult>;
  /** Tears down and re-establishes the automation session. Safe to repeat. */
  restartSession(): Promise<void>;
  /** Whether a native system alert (permission prompt, crash dialog) has focus. */
  hasSystemAlert(): Promise<boolean>;
}

/** Session faults that one restart usually fixes, recognised by message. */
export function isTransientSessionError(err: unknown, markers: readonly string[]): boolean {
  const message = errorMessage(err).toLowerCase();
  return markers.some((marker) => message.includes(marker.toLowerCase()));
}
