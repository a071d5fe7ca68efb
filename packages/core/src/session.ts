/**
 * Training Session — the level-progression state machine.
 *
 * A session walks an ordered list of levels. Each submitted line is either
 * a keyword (`hint`, `exit`, `quit`) or an answer checked against the
 * current level; a correct answer advances to the next level.
 *
 * State and events are exposed as rxjs streams so the CLI and the attempt
 * log can observe the session without the session knowing about either.
 *
 * @module session
 */

import type { Observable } from 'rxjs';
import { BehaviorSubject, Subject } from 'rxjs';
import { checkCommand } from './checker.js';
import { TrainerError } from './errors/index.js';
import { sortLevels, type Level } from './levels/level.js';

/** Keywords that end the session */
const EXIT_KEYWORDS: ReadonlySet<string> = new Set(['exit', 'quit']);

/** Keyword that asks for the current level's hint */
const HINT_KEYWORD = 'hint';

/** Current session state. */
export interface SessionState {
  /** Index into the ordered level list; equals the level count once completed */
  readonly levelIndex: number;
  /** Answers checked against the current level */
  readonly attempts: number;
  /** Hints requested on the current level */
  readonly hintsShown: number;
  /** Ordinals of the levels passed so far */
  readonly completedLevels: readonly number[];
  readonly completed: boolean;
  readonly exited: boolean;
}

/** Result of submitting one line of input. */
export type SubmitOutcome =
  | { readonly kind: 'exit' }
  | { readonly kind: 'hint'; readonly hint: string | null }
  | {
      readonly kind: 'correct';
      readonly level: Level;
      readonly command: string;
      readonly next: Level | null;
    }
  | { readonly kind: 'incorrect'; readonly level: Level };

/** Events emitted while a session runs. */
export type SessionEvent =
  | { readonly type: 'session-started'; readonly timestamp: number }
  | { readonly type: 'level-started'; readonly timestamp: number; readonly level: Level }
  | {
      readonly type: 'input';
      readonly timestamp: number;
      readonly level: Level;
      readonly input: string;
    }
  | {
      readonly type: 'hint';
      readonly timestamp: number;
      readonly level: Level;
      readonly hint: string | null;
    }
  | {
      readonly type: 'correct';
      readonly timestamp: number;
      readonly level: Level;
      readonly input: string;
    }
  | {
      readonly type: 'incorrect';
      readonly timestamp: number;
      readonly level: Level;
      readonly input: string;
    }
  | { readonly type: 'exited'; readonly timestamp: number; readonly level: Level }
  | { readonly type: 'completed'; readonly timestamp: number }
  | { readonly type: 'session-ended'; readonly timestamp: number };

/** Session options. */
export interface TrainerSessionOptions {
  /** Ordinal of the level to begin with (default: the first level) */
  readonly startAt?: number;
  /** Clock used for event timestamps */
  readonly now?: () => number;
}

export class TrainerSession {
  private readonly levels: readonly Level[];
  private readonly now: () => number;
  private readonly stateSubject: BehaviorSubject<SessionState>;
  private readonly eventsSubject = new Subject<SessionEvent>();
  private started = false;
  private ended = false;

  readonly state$: Observable<SessionState>;
  readonly events$: Observable<SessionEvent>;

  constructor(levels: readonly Level[], options: TrainerSessionOptions = {}) {
    if (levels.length === 0) {
      throw TrainerError.fromCode('TRAINER_S200');
    }

    this.levels = sortLevels(levels);
    this.now = options.now ?? Date.now;

    let startIndex = 0;
    if (options.startAt !== undefined) {
      startIndex = this.levels.findIndex((level) => level.ordinal === options.startAt);
      if (startIndex === -1) {
        throw new TrainerError({
          code: 'TRAINER_S201',
          message: `No level with number ${options.startAt}`,
          context: { startAt: options.startAt },
        });
      }
    }

    this.stateSubject = new BehaviorSubject<SessionState>({
      levelIndex: startIndex,
      attempts: 0,
      hintsShown: 0,
      completedLevels: [],
      completed: false,
      exited: false,
    });
    this.state$ = this.stateSubject.asObservable();
    this.events$ = this.eventsSubject.asObservable();
  }

  get state(): SessionState {
    return this.stateSubject.getValue();
  }

  /** All levels in presentation order. */
  get allLevels(): readonly Level[] {
    return this.levels;
  }

  /** The level being attempted, or `null` once every level is passed. */
  get currentLevel(): Level | null {
    return this.levels[this.state.levelIndex] ?? null;
  }

  get isFinished(): boolean {
    return this.state.completed || this.state.exited;
  }

  /** Begin the session. Calling it twice has no effect. */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.emit({ type: 'session-started', timestamp: this.now() });
    this.emitLevelStarted();
  }

  /**
   * Submit one line of learner input.
   *
   * @throws TrainerError `TRAINER_S202` once the session has completed or exited
   */
  submit(rawInput: string): SubmitOutcome {
    if (this.isFinished || this.ended) {
      throw TrainerError.fromCode('TRAINER_S202', { input: rawInput });
    }
    this.start();

    const level = this.requireCurrentLevel();
    const input = rawInput.trim();

    const timestamp = this.now();
    this.emit({ type: 'input', timestamp, level, input });

    const keyword = input.toLowerCase();

    if (EXIT_KEYWORDS.has(keyword)) {
      this.update({ exited: true });
      this.emit({ type: 'exited', timestamp, level });
      return { kind: 'exit' };
    }

    if (keyword === HINT_KEYWORD) {
      const hint = level.hint ? level.hint : null;
      this.update({ hintsShown: this.state.hintsShown + 1 });
      this.emit({ type: 'hint', timestamp, level, hint });
      return { kind: 'hint', hint };
    }

    if (!checkCommand(input, level.expectedCommand)) {
      this.update({ attempts: this.state.attempts + 1 });
      this.emit({ type: 'incorrect', timestamp, level, input });
      return { kind: 'incorrect', level };
    }

    const nextIndex = this.state.levelIndex + 1;
    const next = this.levels[nextIndex] ?? null;

    this.update({
      levelIndex: nextIndex,
      attempts: 0,
      hintsShown: 0,
      completedLevels: [...this.state.completedLevels, level.ordinal],
      completed: next === null,
    });
    this.emit({ type: 'correct', timestamp, level, input });

    if (next === null) {
      this.emit({ type: 'completed', timestamp });
    } else {
      this.emitLevelStarted();
    }

    return { kind: 'correct', level, command: input, next };
  }

  /** End the session and complete both streams. Calling it twice has no effect. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    this.emit({ type: 'session-ended', timestamp: this.now() });
    this.eventsSubject.complete();
    this.stateSubject.complete();
  }

  private requireCurrentLevel(): Level {
    const level = this.currentLevel;
    if (!level) {
      throw TrainerError.fromCode('TRAINER_S202');
    }
    return level;
  }

  private emitLevelStarted(): void {
    const level = this.currentLevel;
    if (level) {
      this.emit({ type: 'level-started', timestamp: this.now(), level });
    }
  }

  private update(partial: Partial<SessionState>): void {
    this.stateSubject.next({ ...this.stateSubject.getValue(), ...partial });
  }

  private emit(event: SessionEvent): void {
    this.eventsSubject.next(event);
  }
}

export function createTrainerSession(
  levels: readonly Level[],
  options?: TrainerSessionOptions
): TrainerSession {
  return new TrainerSession(levels, options);
}
