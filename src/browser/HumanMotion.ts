/**
 * HumanMotion: Pointer implementation with human-looking input.
 *
 * Mouse moves follow an ease-in-out cubic Bézier from the last position,
 * waits are Gaussian around the middle of their range, scrolls go in uneven
 * wheel chunks and typing has per-character cadence.
 */

import { createLogger } from "../logging/logger.js";
import type { ViewportPoint } from "../vision/geometry.js";
import type { MouseSurface, Pointer } from "./types.js";

const log = createLogger("HumanMotion");

export type MotionOptions = {
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

type Pt = { x: number; y: number };

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/** Box-Muller sample, floored at min */
export function gaussian(random: () => number, mean: number, std: number, min: number): number {
  const u1 = 1 - random();
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return Math.max(min, mean + z * std);
}

export function pauseDuration(random: () => number, minMs: number, maxMs: number): number {
  const ms = gaussian(random, (minMs + maxMs) / 2, (maxMs - minMs) / 4, minMs);
  return Math.min(ms, maxMs * 1.2);
}

function uniform(random: () => number, min: number, max: number): number {
  return min + random() * (max - min);
}

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2;
}

/** Curved path from start to end, both included */
export function bezierPath(start: Pt, end: Pt, points: number, random: () => number): Pt[] {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const distance = Math.hypot(dx, dy);
  const amplitude = distance * 0.3;
  const px = dy / (distance + 0.001);
  const py = -dx / (distance + 0.001);

  const off1 = uniform(random, -amplitude, amplitude);
  const off2 = uniform(random, -amplitude * 0.5, amplitude * 0.5);
  const p1 = { x: start.x + dx * 0.3 + px * off1, y: start.y + dy * 0.3 + py * off1 };
  const p2 = { x: start.x + dx * 0.7 + px * off2, y: start.y + dy * 0.7 + py * off2 };

  const path: Pt[] = [];
  for (let i = 0; i < points; i++) {
    const t = easeInOutCubic(i / (points - 1));
    const u = 1 - t;
    const x = u * u * u * start.x + 3 * u * u * t * p1.x + 3 * u * t * t * p2.x + t * t * t * end.x;
    const y = u * u * u * start.y + 3 * u * u * t * p1.y + 3 * u * t * t * p2.y + t * t * t * end.y;
    path.push({ x: Math.round(x), y: Math.round(y) });
  }
  return path;
}

export class HumanMotion implements Pointer {
  private readonly surface: MouseSurface;
  private readonly random: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private last?: Pt;

  constructor(surface: MouseSurface, options: MotionOptions = {}) {
    this.surface = surface;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async pause(minMs: number, maxMs: number): Promise<void> {
    await this.sleep(pauseDuration(this.random, minMs, maxMs));
  }

  private async moveTo(target: Pt): Promise<void> {
    let start = this.last;
    if (!start) {
      const { width, height } = await this.surface.viewportSize();
      start = {
        x: Math.floor(width / 2) + randomInt(this.random, -100, 100),
        y: Math.floor(height / 2) + randomInt(this.random, -100, 100),
      };
    }

    const distance = Math.hypot(target.x - start.x, target.y - start.y);
    const points = Math.max(8, Math.min(25, Math.floor(distance / 30)));
    const path = bezierPath(start, target, points, this.random);
    for (const [i, p] of path.entries()) {
      await this.surface.moveMouse(p.x, p.y);
      const progress = i / path.length;
      const edge = progress < 0.2 || progress > 0.8;
      await this.sleep(edge ? uniform(this.random, 20, 50) : uniform(this.random, 8, 25));
    }
    this.last = target;
  }

  async click(point: ViewportPoint): Promise<void> {
    const target = {
      x: point.x + Math.round(gaussian(this.random, 0, 2, -5)),
      y: point.y + Math.round(gaussian(this.random, 0, 2, -5)),
    };

    await this.moveTo(target);
    await this.pause(80, 250);
    await this.surface.mouseDown();
    await this.sleep(randomInt(this.random, 50, 150));
    await this.surface.mouseUp();
    log.info("click", { x: target.x, y: target.y });

    if (this.random() < 0.15) await this.sleep(gaussian(this.random, 2000, 1000, 500));
  }

  async scroll(direction: "up" | "down", amount?: number): Promise<void> {
    const total = Math.round(amount ?? gaussian(this.random, 350, 100, 150));
    const sign = direction === "down" ? 1 : -1;
    let remaining = total;
    while (remaining > 0) {
      const chunk = Math.min(remaining, Math.round(gaussian(this.random, 90, 30, 40)));
      await this.surface.wheel(sign * chunk);
      remaining -= chunk;
      await this.pause(30, 120);
    }
    log.debug("scroll", { direction, amount: total });
    await this.pause(200, 500);
  }

  async type(selector: string, text: string): Promise<void> {
    await this.surface.focus(selector);
    await this.pause(200, 500);
    for (const char of text) {
      await this.surface.typeChar(char);
      if (/\s/.test(char)) await this.sleep(randomInt(this.random, 80, 200));
      else if (char !== char.toLowerCase()) await this.sleep(randomInt(this.random, 100, 180));
      else await this.sleep(randomInt(this.random, 40, 120));
      if (this.random() < 0.08) await this.pause(300, 800);
    }
  }
}
