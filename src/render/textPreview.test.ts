import { describe, expect, it } from "vitest";
import { dropletCode, SplashGlyph, splashCode, streamCode } from "./cellCodes.js";
import { cellChar, renderText } from "./textPreview.js";

describe("cellChar", () => {
  it("maps each kind to a glyph", () => {
    expect(cellChar(0)).toBe(" ");
    expect(cellChar(dropletCode(0, 0))).toBe(".");
    expect(cellChar(dropletCode(4, 0))).toBe(":");
    expect(cellChar(dropletCode(7, 0))).toBe("|");
    expect(cellChar(dropletCode(7, 2))).toBe("'");
    expect(cellChar(splashCode(3, SplashGlyph.LeftWing))).toBe("\\");
    expect(cellChar(splashCode(3, SplashGlyph.RightWing))).toBe("/");
    expect(cellChar(streamCode(1, 3))).toBe("~");
    expect(cellChar(streamCode(1, 0))).toBe(".");
    expect(cellChar(200)).toBe("?");
  });
});

describe("renderText", () => {
  it("renders rows top to bottom", () => {
    const cells = Uint8Array.from([0, dropletCode(7, 0), 0, splashCode(0, SplashGlyph.Center), 0, streamCode(0, 2)]);
    expect(renderText(cells, 3, 2)).toBe(" | \no =");
  });
});
