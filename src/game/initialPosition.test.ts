import { describe, it, expect } from "vitest";
import { INITIAL_PIECES, layoutFromRows } from "./initialPosition.ts";
import { ConfigurationError } from "./errors.ts";

describe("initialPosition", () => {
  it("standard opening: black on ranks 1 and 8, white on files a and h, corners empty", () => {
    const rows = ["-bbbbbb-", "w------w", "w------w", "w------w", "w------w", "w------w", "w------w", "-bbbbbb-"];
    expect(layoutFromRows(rows)).toEqual(INITIAL_PIECES);
    expect(INITIAL_PIECES[0][0]).toBe("E");
    expect(INITIAL_PIECES[0][1]).toBe("B");
    expect(INITIAL_PIECES[1][0]).toBe("W");
    expect(INITIAL_PIECES[7][7]).toBe("E");
  });

  it("reads ranks top first", () => {
    const layout = layoutFromRows(["w-------", "--------", "--------", "--------", "--------", "--------", "--------", "-------b"]);
    expect(layout[7][0]).toBe("W");
    expect(layout[0][7]).toBe("B");
  });

  it("ignores spaces inside a rank", () => {
    const layout = layoutFromRows(["w - - - - - - -", "--------", "--------", "--------", "--------", "--------", "--------", "--------"]);
    expect(layout[7][0]).toBe("W");
  });

  it("rejects malformed layouts", () => {
    expect(() => layoutFromRows(["--------"])).toThrow(ConfigurationError);
    expect(() =>
      layoutFromRows(["-------", "--------", "--------", "--------", "--------", "--------", "--------", "--------"])
    ).toThrow(ConfigurationError);
    expect(() =>
      layoutFromRows(["x-------", "--------", "--------", "--------", "--------", "--------", "--------", "--------"])
    ).toThrow(/unknown piece "x"/);
  });
});
