/**
 * One-shot gate a paused task waits on until resume or cancel opens it
 */
export class PauseGate {
  private readonly opened: Promise<void>;
  private openGate: () => void = () => {};

  constructor() {
    this.opened = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  wait(): Promise<void> {
    return this.opened;
  }

  open(): void {
    this.openGate();
  }
}
