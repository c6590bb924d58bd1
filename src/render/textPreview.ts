import { type DecodedCell, decodeCell } from "./cellCodes.js";

const DROP_HEAD = ".:|";
const DROP_TRAIL = "'";
// Indexed by SplashGlyph
const SPLASH_GLYPHS = "o|.:\\/_-";
// Indexed by stream size, smallest first
const STREAM_GLYPHS = ".-=~";

/** One ASCII character for a cell code. */
export function cellChar(code: number, scratch?: DecodedCell): string {
  const c = decodeCell(code, scratch);
  switch (c.kind) {
    case "empty":
      return " ";
    case "droplet":
      return c.variant === 0 ? (DROP_HEAD[Math.min(2, Math.floor(c.bucket / 3))] ?? "|") : DROP_TRAIL;
    case "splash":
      return SPLASH_GLYPHS[c.variant] ?? "*";
    case "stream":
      return STREAM_GLYPHS[c.variant] ?? "~";
    default:
      return "?";
  }
}

/** Render a frame buffer as newline-separated rows of text. */
export function renderText(cells: Uint8Array, width: number, height: number): string {
  const scratch: DecodedCell = { kind: "empty", bucket: -1, variant: -1 };
  const rows: string[] = [];
  for (let y = 0; y < height; y++) {
    let row = "";
    for (let x = 0; x < width; x++) {
      row += cellChar(cells[y * width + x] ?? 0, scratch);
    }
    rows.push(row);
  }
  return rows.join("\n");
}
