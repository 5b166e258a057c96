import { formatGrid, parseGrid } from "./grid-utils";
import { InvalidGridError } from "../simulation/validation";

describe("formatGrid", () => {
  it("writes one row per line", () => {
    expect(formatGrid([[2, 4, 1, 3], [2, 0, 5, 4], [1, 4, 3, 3]])).toBe("2 4 1 3\n2 0 5 4\n1 4 3 3");
  });

  it("right-aligns values to the widest one", () => {
    expect(formatGrid([[-1, 10], [3, 4]])).toBe("-1 10\n 3  4");
  });

  it("formats a single cell", () => {
    expect(formatGrid([[7]])).toBe("7");
  });
});

describe("parseGrid", () => {
  it("parses a JSON array of rows", () => {
    expect(parseGrid("[[1, 2], [3, 4]]")).toEqual([[1, 2], [3, 4]]);
    expect(parseGrid(" [[-5]]\n")).toEqual([[-5]]);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseGrid("1 2 3")).toThrow(InvalidGridError);
  });

  it("rejects JSON that is not an array of rows", () => {
    expect(() => parseGrid("{}")).toThrow("Invalid grid: expected an array of rows.");
    expect(() => parseGrid("[1, 2]")).toThrow("Invalid grid: row 0 is not an array.");
  });

  it("rejects cells that are not numbers", () => {
    expect(() => parseGrid('[[1, "2"]]')).toThrow("Invalid grid: cell (0, 1) is not a number.");
  });

  it("rejects jagged and fractional grids", () => {
    expect(() => parseGrid("[[1, 2], [3]]")).toThrow(InvalidGridError);
    expect(() => parseGrid("[[1.5]]")).toThrow(InvalidGridError);
  });
});
