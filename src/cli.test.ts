import { createLogger } from "winston";
import { run } from "./cli";
import { createCliLogger } from "./logger";
import { InvalidRoundCountError } from "./simulation/validation";

const silentLogger = () => createLogger({ silent: true });

describe("run", () => {
  it("writes the resulting grid", () => {
    const write = jest.fn();
    const result = run(["--rounds", "1", "--grid", "[[0,0,0],[0,4,0],[0,0,0]]"], {}, silentLogger(), write);
    expect(result).toEqual([[0, 1, 0], [1, 0, 1], [0, 1, 0]]);
    expect(write).toHaveBeenCalledWith("0 1 0\n1 0 1\n0 1 0\n");
  });

  it("runs the sample grid by default", () => {
    const write = jest.fn();
    run([], {}, silentLogger(), write);
    expect(write).toHaveBeenCalledWith("2 4 1 3\n2 0 5 4\n1 4 3 3\n");
  });

  it("gives the same grid in shuffled order", () => {
    const write = jest.fn();
    run(["--order", "shuffled", "--seed", "test-seed"], {}, silentLogger(), write);
    expect(write).toHaveBeenCalledWith("2 4 1 3\n2 0 5 4\n1 4 3 3\n");
  });

  it("applies the configured log level", () => {
    const logger = silentLogger();
    run(["--log-level", "debug"], {}, logger, jest.fn());
    expect(logger.level).toBe("debug");
  });

  it("propagates errors without writing anything", () => {
    const write = jest.fn();
    expect(() => run(["--rounds=-1"], {}, silentLogger(), write)).toThrow(InvalidRoundCountError);
    expect(write).not.toHaveBeenCalled();
  });
});

describe("createCliLogger", () => {
  it("uses the requested level", () => {
    expect(createCliLogger("warn").level).toBe("warn");
  });
});
