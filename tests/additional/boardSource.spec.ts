import {expect} from "chai";
import {join} from "node:path";
import {parseBoardSource, readBoardSource} from "../../src/worker/boardSource";
import {makeWorkspace} from "../helpers/fixtures";

describe("parseBoardSource", function () {
  it("splits content from the trailing clock", function () {
    expect(parseBoardSource("A\r\nB\r\nTimestamp: 2024-05-01 12:00\r\n")).to.deep.equal({
      kind: "ready",
      lines: ["A", "B"],
      clock: "2024-05-01 12:00"
    });
  });

  it("accepts a clock without a space after the prefix", function () {
    expect(parseBoardSource("Timestamp:t9")).to.deep.equal({kind: "ready", lines: [], clock: "t9"});
  });

  it("keeps blank content lines", function () {
    expect(parseBoardSource("A\n\nTimestamp: t1\n")).to.deep.equal({kind: "ready", lines: ["A", ""], clock: "t1"});
  });

  it("reports an empty file", function () {
    expect(parseBoardSource("")).to.deep.equal({kind: "empty"});
  });

  it("reports a missing clock line", function () {
    expect(parseBoardSource("A\nB\n")).to.deep.equal({kind: "malformed", lastLine: "B"});
    expect(parseBoardSource("Timestamp: t1\nA\n")).to.deep.equal({kind: "malformed", lastLine: "A"});
  });
});

describe("readBoardSource", function () {
  it("reports a file that does not exist", async function () {
    const path = join(await makeWorkspace(), "board0.txt");

    expect(await readBoardSource(path)).to.deep.equal({kind: "missing"});
  });
});
