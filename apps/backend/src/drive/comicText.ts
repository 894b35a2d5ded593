import type { ComicTextSnapshot } from "../models/drive";
import type { Rng } from "../utils/random";

export const COMIC_TAUNTS: readonly string[] = [
  "Learn how to drive!",
  "Nice driving, grandma!",
  "Did you get your license from a cereal box?",
  "Sunday driver alert!",
  "Is this your first time?",
  "The gas pedal is on the right!",
  "Speed limit's just a suggestion!",
  "Move it or lose it!",
  "You drive like my neighbor!",
  "Beep beep! Coming through!",
  "Are we there yet?",
  "I've seen snails go faster!",
  "Driving school dropout?",
  "Born to be mild!",
  "Wake me when we get there...",
];

/** Cosmetic taunts from passing traffic; has no effect on the race. */
export class ComicTextTimer {
  private timer = 0;
  private nextAt: number;
  private text: string | null = null;
  private remaining = 0;

  constructor(
    private readonly interval: [number, number],
    private readonly duration: number,
    private readonly rng: Rng,
    private readonly taunts: readonly string[] = COMIC_TAUNTS,
  ) {
    this.nextAt = rng.between(...interval);
  }

  reset() {
    this.timer = 0;
    this.nextAt = this.rng.between(...this.interval);
    this.text = null;
    this.remaining = 0;
  }

  update(dt: number) {
    if (this.remaining > 0) {
      this.remaining -= dt;
      if (this.remaining <= 0) {
        this.remaining = 0;
        this.text = null;
      }
    }

    this.timer += dt;
    if (this.timer >= this.nextAt && this.taunts.length > 0) {
      this.text = this.rng.pick(this.taunts);
      this.remaining = this.duration;
      this.timer = 0;
      this.nextAt = this.rng.between(...this.interval);
    }
  }

  getSnapshot(): ComicTextSnapshot {
    return { text: this.text, remaining: this.remaining };
  }
}
