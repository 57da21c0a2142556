/**
 * Page State Machine
 *
 * Allowed transitions of one page through the pipeline.
 */

export type PageState =
  | 'LOADED'
  | 'PREPROCESSED'
  | 'OCR_DONE'
  | 'NORMALIZED'
  | 'FIELDS_EXTRACTED'
  | 'RESULT_READY'
  | 'FAILED';

export const terminalStates: ReadonlySet<PageState> = new Set(['RESULT_READY', 'FAILED']);

const allowedTransitions: Record<PageState, ReadonlyArray<PageState>> = {
  LOADED: ['PREPROCESSED', 'FAILED'],
  PREPROCESSED: ['OCR_DONE', 'FAILED'],
  OCR_DONE: ['NORMALIZED', 'FAILED'],
  NORMALIZED: ['FIELDS_EXTRACTED', 'FAILED'],
  FIELDS_EXTRACTED: ['RESULT_READY', 'FAILED'],
  RESULT_READY: [],
  FAILED: [],
};

export class PageStateMachine {
  canTransition(from: PageState, to: PageState): boolean {
    return allowedTransitions[from].includes(to);
  }

  assertTransition(from: PageState, to: PageState): void {
    if (terminalStates.has(from)) {
      throw new Error(`Cannot transition terminal page state ${from}`);
    }
    if (!this.canTransition(from, to)) {
      throw new Error(`Invalid page state transition: ${from} -> ${to}`);
    }
  }

  isTerminal(state: PageState): boolean {
    return terminalStates.has(state);
  }
}

export const pageStateMachine = new PageStateMachine();
