/**
 * Pomodoro Timer
 *
 * Study Tracker timer with two modes:
 * - stopwatch: counts up until stopped; the elapsed minutes pre-fill a log
 * - pomodoro: counts down work and break phases, with a long break after
 *   every `cyclesBeforeLongBreak` completed work phases
 *
 * Ticks once per second on the event loop (setInterval).
 *
 * @example
 * ```typescript
 * const timer = new PomodoroTimer({ workMinutes: 25, breakMinutes: 5, longBreakMinutes: 15 });
 * timer.on('phase', (finished, next) => console.log(`${finished} over, ${next} next`));
 * timer.setMode('pomodoro');
 * timer.start();
 * ```
 */

import { EventEmitter } from 'node:events';

export const TIMER_MODES = ['stopwatch', 'pomodoro'] as const;
export type TimerMode = (typeof TIMER_MODES)[number];

export type PomodoroPhase = 'work' | 'break' | 'long_break';

export const DEFAULT_CYCLES_BEFORE_LONG_BREAK = 4;

const TICK_MS = 1000;

export interface PomodoroTimerOptions {
  workMinutes: number;
  breakMinutes: number;
  longBreakMinutes: number;
  cyclesBeforeLongBreak?: number;
}

export interface TimerSnapshot {
  mode: TimerMode;
  running: boolean;
  phase: PomodoroPhase;
  /** Seconds counted since the last reset (all phases) */
  elapsedSeconds: number;
  /** Seconds left in the current phase; null in stopwatch mode */
  remainingSeconds: number | null;
  completedWorkPhases: number;
}

/**
 * Type-safe event map for PomodoroTimer.
 */
export interface PomodoroTimerEvents {
  tick: [snapshot: TimerSnapshot];
  phase: [finished: PomodoroPhase, next: PomodoroPhase, snapshot: TimerSnapshot];
  start: [snapshot: TimerSnapshot];
  stop: [snapshot: TimerSnapshot];
}

/** `mm:ss` (or `h:mm:ss` past an hour) */
export function formatClock(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const pad = (n: number): string => String(n).padStart(2, '0');
  return h > 0 ? `${h}:${pad(m)}:${pad(s)}` : `${pad(m)}:${pad(s)}`;
}

export class PomodoroTimer extends EventEmitter<PomodoroTimerEvents> {
  private mode: TimerMode = 'stopwatch';
  private phase: PomodoroPhase = 'work';
  private interval: ReturnType<typeof setInterval> | null = null;

  private elapsedSeconds = 0;
  private phaseSeconds = 0;
  private workSeconds = 0;
  private completedWorkPhases = 0;

  private readonly durations: Record<PomodoroPhase, number>;
  private readonly cyclesBeforeLongBreak: number;

  constructor(options: PomodoroTimerOptions) {
    super();
    this.durations = {
      work: options.workMinutes * 60,
      break: options.breakMinutes * 60,
      long_break: options.longBreakMinutes * 60,
    };
    this.cyclesBeforeLongBreak = options.cyclesBeforeLongBreak ?? DEFAULT_CYCLES_BEFORE_LONG_BREAK;
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => this.tick(), TICK_MS);
    this.emit('start', this.snapshot());
  }

  /**
   * Stop counting and return the minutes studied (at least 1).
   *
   * Stopwatch mode counts all elapsed time; pomodoro mode counts work
   * phases only.
   */
  stop(): number {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
      this.emit('stop', this.snapshot());
    }
    const seconds = this.mode === 'stopwatch' ? this.elapsedSeconds : this.workSeconds;
    return Math.max(1, Math.round(seconds / 60));
  }

  reset(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.phase = 'work';
    this.elapsedSeconds = 0;
    this.phaseSeconds = 0;
    this.workSeconds = 0;
    this.completedWorkPhases = 0;
  }

  /** Switching mode stops and resets the timer */
  setMode(mode: TimerMode): void {
    this.reset();
    this.mode = mode;
  }

  snapshot(): TimerSnapshot {
    return {
      mode: this.mode,
      running: this.isRunning(),
      phase: this.phase,
      elapsedSeconds: this.elapsedSeconds,
      remainingSeconds: this.mode === 'pomodoro' ? this.durations[this.phase] - this.phaseSeconds : null,
      completedWorkPhases: this.completedWorkPhases,
    };
  }

  private tick(): void {
    this.elapsedSeconds++;

    if (this.mode === 'pomodoro') {
      this.phaseSeconds++;
      if (this.phase === 'work') {
        this.workSeconds++;
      }
      if (this.phaseSeconds >= this.durations[this.phase]) {
        this.advancePhase();
      }
    }

    this.emit('tick', this.snapshot());
  }

  private advancePhase(): void {
    const finished = this.phase;
    if (finished === 'work') {
      this.completedWorkPhases++;
      this.phase = this.completedWorkPhases % this.cyclesBeforeLongBreak === 0 ? 'long_break' : 'break';
    } else {
      this.phase = 'work';
    }
    this.phaseSeconds = 0;
    this.emit('phase', finished, this.phase, this.snapshot());
  }
}
