export {
  PomodoroTimer,
  TIMER_MODES,
  DEFAULT_CYCLES_BEFORE_LONG_BREAK,
  formatClock,
  type TimerMode,
  type PomodoroPhase,
  type PomodoroTimerOptions,
  type TimerSnapshot,
  type PomodoroTimerEvents,
} from './timer.js';
