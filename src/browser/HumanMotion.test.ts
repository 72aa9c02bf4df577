import { describe, expect, it } from "vitest";
import { viewportPoint } from "../vision/geometry.js";
import { bezierPath, HumanMotion, pauseDuration } from "./HumanMotion.js";
import type { MouseSurface } from "./types.js";

function recordingSurface(events: string[]): MouseSurface {
  return {
    viewportSize: async () => ({ width: 1536, height: 864 }),
    moveMouse: async (x, y) => {
      events.push(`move ${x},${y}`);
    },
    mouseDown: async () => {
      events.push("down");
    },
    mouseUp: async () => {
      events.push("up");
    },
    wheel: async (dy) => {
      events.push(`wheel ${dy}`);
    },
    focus: async (selector) => {
      events.push(`focus ${selector}`);
    },
    typeChar: async (char) => {
      events.push(`key ${char}`);
    },
  };
}

const middle = () => 0.5;
const noSleep = async () => {};

describe("bezierPath", () => {
  it("starts and ends exactly at the endpoints", () => {
    const path = bezierPath({ x: 10, y: 20 }, { x: 400, y: 300 }, 12, Math.random);
    expect(path).toHaveLength(12);
    expect(path[0]).toEqual({ x: 10, y: 20 });
    expect(path[11]).toEqual({ x: 400, y: 300 });
  });
});

describe("pauseDuration", () => {
  it("stays between the minimum and 120% of the maximum", () => {
    for (let i = 0; i < 500; i++) {
      const ms = pauseDuration(Math.random, 500, 800);
      expect(ms).toBeGreaterThanOrEqual(500);
      expect(ms).toBeLessThanOrEqual(960);
    }
  });
});

describe("HumanMotion", () => {
  it("moves to the jittered target and presses once", async () => {
    const events: string[] = [];
    const motion = new HumanMotion(recordingSurface(events), { random: middle, sleep: noSleep });

    await motion.click(viewportPoint(500, 300));

    expect(events[0]).toBe("move 768,432");
    expect(events.slice(-3)).toEqual(["move 498,298", "down", "up"]);
    expect(events.filter((e) => e === "down")).toHaveLength(1);
  });

  it("continues the next move from the last click", async () => {
    const events: string[] = [];
    const motion = new HumanMotion(recordingSurface(events), { random: middle, sleep: noSleep });

    await motion.click(viewportPoint(500, 300));
    events.length = 0;
    await motion.click(viewportPoint(900, 600));

    expect(events[0]).toBe("move 498,298");
  });

  it("scrolls in wheel chunks that add up to the amount", async () => {
    const events: string[] = [];
    const motion = new HumanMotion(recordingSurface(events), { random: middle, sleep: noSleep });

    await motion.scroll("down", 200);
    expect(events).toEqual(["wheel 55", "wheel 55", "wheel 55", "wheel 35"]);

    events.length = 0;
    await motion.scroll("up", 50);
    expect(events).toEqual(["wheel -50"]);
  });

  it("types one key at a time into the focused field", async () => {
    const events: string[] = [];
    const motion = new HumanMotion(recordingSurface(events), { random: middle, sleep: noSleep });

    await motion.type("#email", "Ab c");
    expect(events).toEqual(["focus #email", "key A", "key b", "key  ", "key c"]);
  });
});
