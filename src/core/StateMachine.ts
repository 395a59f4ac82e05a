/**
 * Lifecycle of a {@link WavReader}.
 *
 * - IDLE: Nothing parsed yet, or the previous result was discarded.
 * - PARSING: A parse pass is running.
 * - OPEN: The last parse succeeded and its document is available.
 * - FAILED: The last parse failed; no document is available.
 */
export enum ReaderState {
  IDLE,
  PARSING,
  OPEN,
  FAILED,
}

export class ReaderStateMachine {
  private _state: ReaderState = ReaderState.IDLE;

  public get state(): ReaderState {
    return this._state;
  }

  public transition(newState: ReaderState): void {
    if (!this.isValidTransition(newState)) {
      throw new Error(`Invalid state transition: ${ReaderState[this._state]} -> ${ReaderState[newState]}`);
    }
    this._state = newState;
  }

  private isValidTransition(newState: ReaderState): boolean {
    switch (this._state) {
      case ReaderState.IDLE:
        return newState === ReaderState.PARSING;
      case ReaderState.PARSING:
        return newState === ReaderState.OPEN || newState === ReaderState.FAILED;
      case ReaderState.OPEN:
      case ReaderState.FAILED:
        return newState === ReaderState.IDLE;
      default:
        return false;
    }
  }
}
