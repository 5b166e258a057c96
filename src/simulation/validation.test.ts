import { InvalidGridError, InvalidRoundCountError, assertRectangularGrid, assertRoundCount } from "./validation";

describe("assertRectangularGrid", () => {
  it("accepts rectangular integer grids, including negative values", () => {
    expect(() => assertRectangularGrid([[1, -2], [3, 4]])).not.toThrow();
    expect(() => assertRectangularGrid([[0]])).not.toThrow();
  });

  it("rejects an empty grid", () => {
    expect(() => assertRectangularGrid([])).toThrow(InvalidGridError);
    expect(() => assertRectangularGrid([[]])).toThrow("Invalid grid: expected at least one column.");
  });

  it("rejects jagged rows", () => {
    expect(() => assertRectangularGrid([[1, 2], [3]])).toThrow(
      "Invalid grid: row 1 has 1 columns, expected 2.",
    );
  });

  it("rejects values that are not integers", () => {
    expect(() => assertRectangularGrid([[1, 2.5]])).toThrow("Invalid grid: cell (0, 1) is 2.5, expected an integer.");
    expect(() => assertRectangularGrid([[NaN]])).toThrow(InvalidGridError);
    expect(() => assertRectangularGrid([[Infinity]])).toThrow(InvalidGridError);
  });
});

describe("assertRoundCount", () => {
  it("accepts zero and positive integers", () => {
    expect(() => assertRoundCount(0)).not.toThrow();
    expect(() => assertRoundCount(12)).not.toThrow();
  });

  it("rejects negative and fractional counts", () => {
    expect(() => assertRoundCount(-1)).toThrow("Invalid round count: -1. Expected a non-negative integer.");
    expect(() => assertRoundCount(1.5)).toThrow(InvalidRoundCountError);
    expect(() => assertRoundCount(NaN)).toThrow(InvalidRoundCountError);
  });
});
