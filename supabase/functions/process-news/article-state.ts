// Per-article lifecycle. DUPLICATE, PERSISTED and FAILED are terminal.

import { PipelineError } from "../_shared/errors.ts";

export type ArticleState =
  | "FETCHED"
  | "HASHED"
  | "DUPLICATE"
  | "NEW"
  | "GENERATING"
  | "FUSING"
  | "CONFIRMING"
  | "PERSISTED"
  | "FAILED";

const TRANSITIONS: Record<ArticleState, readonly ArticleState[]> = {
  FETCHED:    ["HASHED", "FAILED"],
  HASHED:     ["DUPLICATE", "NEW", "FAILED"],
  DUPLICATE:  [],
  NEW:        ["GENERATING", "FAILED"],
  GENERATING: ["FUSING", "FAILED"],
  FUSING:     ["CONFIRMING", "FAILED"],
  CONFIRMING: ["PERSISTED", "FAILED"],
  PERSISTED:  [],
  FAILED:     [],
};

export class IllegalTransitionError extends PipelineError {
  constructor(readonly from: ArticleState, readonly to: ArticleState) {
    super(`illegal article transition ${from} → ${to}`);
  }
}

export function canTransition(from: ArticleState, to: ArticleState): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Mutable cursor over one article's lifecycle. */
export class ArticleLifecycle {
  private current: ArticleState = "FETCHED";

  get state(): ArticleState {
    return this.current;
  }

  advance(to: ArticleState): void {
    if (!canTransition(this.current, to)) throw new IllegalTransitionError(this.current, to);
    this.current = to;
  }

  get terminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }
}
