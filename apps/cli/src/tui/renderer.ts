import { GameSnapshot } from "@reversi/core";
import { IRenderer } from "@reversi/engine";

type Listener = (view: GameSnapshot) => void;

/**
 * Keeps the latest snapshot the orchestrator drew and hands it to whichever
 * screen is subscribed.
 */
export class SnapshotRenderer implements IRenderer {
  private latest: GameSnapshot | null = null;
  private listeners = new Set<Listener>();
  private frames = 0;

  render(view: GameSnapshot): void {
    this.latest = view;
    this.frames++;
    for (const listener of this.listeners) {
      listener(view);
    }
  }

  current(): GameSnapshot | null {
    return this.latest;
  }

  get frameCount(): number {
    return this.frames;
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
