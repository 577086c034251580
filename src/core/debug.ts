/**
 * Per-shard debug/breakpoint controller: host-written session registers, the
 * synchronising pipelines that carry them into the clock domain, and the
 * execution-side halt latches.
 */
import { DelayLine } from './pipeline';
import { FORCE_LOAD_LATENCY, OVERRIDE_LATENCY, STEP_EDGE_LATENCY } from './constants';
import type { Breakpoint } from './types';

interface OverrideWrite {
  value: number | null;
}

export interface DebugEvents {
  /** Index delivered by the forced-load pipeline this edge */
  forced: number | null;
  /** Rising edge of the synchronised step toggle */
  stepEdge: boolean;
}

export class DebugController {
  // Session registers (host side)
  haltRequest = false;
  stepToggle = false;
  readonly breakpoints: [Breakpoint, Breakpoint] = [
    { value: 0, enabled: false },
    { value: 0, enabled: false },
  ];
  /** Last value written to the override register, as read back by the host */
  overrideRegister: number | null = null;

  // Pipelines
  private forceLine = new DelayLine<number | null>(FORCE_LOAD_LATENCY, null);
  private overrideLine = new DelayLine<OverrideWrite | null>(OVERRIDE_LATENCY, null);
  private stepLine = new DelayLine<boolean>(STEP_EDGE_LATENCY, false);
  private pendingForce: number | null = null;
  private pendingOverride: OverrideWrite | null = null;
  private lastStepLevel = false;

  // Execution side
  halted = false;
  bpActive: [boolean, boolean] = [false, false];
  debugIndex = 0;
  snapshot = 0;
  /** Override delivered by the pipeline; applies only while halted */
  override: number | null = null;

  requestForce(index: number): void {
    this.pendingForce = index;
  }

  writeOverride(value: number | null): void {
    this.overrideRegister = value;
    this.pendingOverride = { value };
  }

  /** Clock the pipelines one edge and report what emerged. */
  advance(): DebugEvents {
    const forced = this.forceLine.advance(this.pendingForce);
    this.pendingForce = null;

    const ovr = this.overrideLine.advance(this.pendingOverride);
    this.pendingOverride = null;
    if (ovr) this.override = ovr.value;

    const level = this.stepLine.advance(this.stepToggle);
    const stepEdge = level && !this.lastStepLevel;
    this.lastStepLevel = level;

    return { forced, stepEdge };
  }

  /** Comparator that fires for `next`, or -1. A comparator whose latch is set stays quiet. */
  breakpointHit(next: number): number {
    for (let k = 0; k < 2; k++) {
      const bp = this.breakpoints[k];
      if (bp.enabled && !this.bpActive[k] && bp.value === next) return k;
    }
    return -1;
  }

  get anyBpActive(): boolean {
    return this.bpActive[0] || this.bpActive[1];
  }

  /** Clear latches once the engine has left their index (or the comparator is off). */
  settle(index: number): void {
    for (let k = 0; k < 2; k++) {
      const bp = this.breakpoints[k];
      if (!bp.enabled || bp.value !== index) this.bpActive[k] = false;
    }
  }

  /** Abort in-flight pipeline traffic. The step detector refills with the current level so no edge is invented. */
  clearPipelines(): void {
    this.forceLine.clear();
    this.overrideLine.clear();
    this.stepLine.clear(this.stepToggle);
    this.lastStepLevel = this.stepToggle;
    this.pendingForce = null;
    this.pendingOverride = null;
  }

  /** FSM reset: execution latches back to RUN at index 0; session registers kept. */
  resetExecution(): void {
    this.halted = false;
    this.bpActive = [false, false];
    this.debugIndex = 0;
    this.snapshot = 0;
    this.clearPipelines();
  }

  /** System reset: session registers disabled as well. */
  resetSession(): void {
    this.haltRequest = false;
    this.stepToggle = false;
    for (const bp of this.breakpoints) {
      bp.value = 0;
      bp.enabled = false;
    }
    this.overrideRegister = null;
    this.override = null;
    this.resetExecution();
  }
}
