/**
 * Mutable run state shared by the scan loop and the operator surfaces
 * (Telegram commands, status API). Plain fields on one owned instance;
 * both sides run on the same event loop.
 */

export type PassSummary = {
  startedAt: string;
  durationMs: number;
  cards: number;
  clicked: string[];
  notified: number;
  failedNotifications: number;
};

export class RunnerState {
  private _paused = false;
  nightMode = false;
  lastPass?: PassSummary;

  get paused(): boolean {
    return this._paused;
  }

  /** false when already paused */
  pause(): boolean {
    if (this._paused) return false;
    this._paused = true;
    return true;
  }

  /** false when not paused */
  resume(): boolean {
    if (!this._paused) return false;
    this._paused = false;
    return true;
  }
}
