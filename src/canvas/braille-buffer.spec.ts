import { describe, it, expect } from "vitest";
import { BrailleBuffer } from "./braille-buffer.ts";

describe("BrailleBuffer", () => {
  describe("pixel operations", () => {
    it("sets and unsets a pixel", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(5, 9);
      expect(buffer.getPixel(5, 9)).toBe(true);
      buffer.unsetPixel(5, 9);
      expect(buffer.getPixel(5, 9)).toBe(false);
    });

    it("toggling twice restores the pixel", () => {
      const buffer = new BrailleBuffer();
      buffer.togglePixel(3, 2);
      expect(buffer.getPixel(3, 2)).toBe(true);
      buffer.togglePixel(3, 2);
      expect(buffer.getPixel(3, 2)).toBe(false);

      buffer.setPixel(3, 2);
      buffer.togglePixel(3, 2);
      buffer.togglePixel(3, 2);
      expect(buffer.getPixel(3, 2)).toBe(true);
    });

    it("writes the literal bit for each sub-pixel", () => {
      const cases: [number, number, number][] = [
        [1, 3, 0x80],
        [0, 0, 0x01],
        [1, 0, 0x08],
        [0, 3, 0x40],
        [1, 1, 0x10],
        [0, 2, 0x04],
      ];

      for (const [x, y, mask] of cases) {
        const buffer = new BrailleBuffer();
        buffer.setPixel(x, y);
        expect(buffer.maskAt(x, y)).toBe(mask);
      }
    });

    it("is idempotent under repeated set", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(1, 2);
      const once = buffer.maskAt(1, 2);
      buffer.setPixel(1, 2);
      expect(buffer.maskAt(1, 2)).toBe(once);
      expect(once).toBe(0x20);
    });

    it("combines pixels sharing a cell", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(0, 0);
      buffer.setPixel(1, 3);
      expect(buffer.maskAt(0, 0)).toBe(0x81);
      expect(buffer.cellCount).toBe(1);
    });

    it("reads absent cells as empty without creating them", () => {
      const buffer = new BrailleBuffer();
      expect(buffer.getPixel(100, 100)).toBe(false);
      expect(buffer.maskAt(100, 100)).toBe(0);
      expect(buffer.cellCount).toBe(0);
      expect(buffer.isEmpty).toBe(true);
    });

    it("drops a cell once its last dot is cleared", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(4, 4);
      buffer.unsetPixel(4, 4);
      expect(buffer.cellCount).toBe(0);

      buffer.togglePixel(4, 4);
      buffer.togglePixel(4, 4);
      expect(buffer.cellCount).toBe(0);
    });

    it("clears every cell", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(0, 0);
      buffer.setPixel(30, 40);
      buffer.clear();
      expect(buffer.isEmpty).toBe(true);
      expect(buffer.frame()).toBe("");
    });

    it("rejects negative and fractional coordinates", () => {
      const buffer = new BrailleBuffer();
      expect(() => buffer.setPixel(-1, 0)).toThrow(RangeError);
      expect(() => buffer.getPixel(0, -4)).toThrow(RangeError);
      expect(() => buffer.togglePixel(0.5, 1)).toThrow(
        "Pixel coordinates must be non-negative integers, received: (0.5, 1)",
      );
      expect(buffer.isEmpty).toBe(true);
    });
  });

  describe("extent", () => {
    it("reports [0, 0] for an empty buffer", () => {
      const buffer = new BrailleBuffer();
      expect(buffer.rowRange()).toEqual([0, 0]);
      expect(buffer.colRange()).toEqual([0, 0]);
    });

    it("tracks the bounding box of set cells", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(2, 2);
      buffer.setPixel(10, 10);
      expect(buffer.rowRange()).toEqual([0, 2]);
      expect(buffer.colRange()).toEqual([1, 5]);
    });

    it("shrinks when the outermost pixel is removed", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(2, 2);
      buffer.setPixel(10, 10);
      buffer.unsetPixel(10, 10);
      expect(buffer.rowRange()).toEqual([0, 0]);
      expect(buffer.colRange()).toEqual([1, 1]);

      buffer.unsetPixel(2, 2);
      expect(buffer.rowRange()).toEqual([0, 0]);
      expect(buffer.colRange()).toEqual([0, 0]);
    });
  });

  describe("frame", () => {
    it("is empty for an empty buffer", () => {
      const buffer = new BrailleBuffer();
      expect(buffer.frame()).toBe("");
      expect(buffer.toLines()).toEqual([]);
    });

    it("renders a single dot", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(0, 0);
      expect(buffer.frame()).toBe("⠁");
    });

    it("starts at the first occupied cell", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(10, 10);
      expect(buffer.frame()).toBe("⠄");
    });

    it("fills gaps inside the bounding box with blank glyphs", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(2, 2);
      buffer.setPixel(10, 10);
      expect(buffer.toLines()).toEqual([
        "⠄⠀⠀⠀⠀",
        "⠀⠀⠀⠀⠀",
        "⠀⠀⠀⠀⠄",
      ]);
      expect(buffer.frame()).toBe(
        "⠄⠀⠀⠀⠀\n⠀⠀⠀⠀⠀\n⠀⠀⠀⠀⠄",
      );
    });
  });

  describe("pixels", () => {
    it("lists set pixels by cell row, cell column, then bit", () => {
      const buffer = new BrailleBuffer();
      buffer.setPixel(0, 5);
      buffer.setPixel(3, 0);
      buffer.setPixel(1, 0);
      buffer.setPixel(0, 1);
      expect(buffer.pixels()).toEqual([
        { x: 0, y: 1 },
        { x: 1, y: 0 },
        { x: 3, y: 0 },
        { x: 0, y: 5 },
      ]);
    });
  });

  describe("fromLines", () => {
    it("places the first line at cell row 0", () => {
      const buffer = BrailleBuffer.fromLines(["⠁⠀", "⠀⢀"]);
      expect(buffer.pixels()).toEqual([
        { x: 0, y: 0 },
        { x: 3, y: 7 },
      ]);
      expect(buffer.frame()).toBe("⠁⠀\n⠀⢀");
    });

    it("reads characters outside the braille block as blank", () => {
      const buffer = BrailleBuffer.fromLines(["a⠁"]);
      expect(buffer.pixels()).toEqual([{ x: 2, y: 0 }]);
      expect(buffer.frame()).toBe("⠁");
    });
  });
});
