import {expect} from "chai";
import {createMemoryLogger} from "../../src/shared/logger";

describe("logger", function () {
  it("merges bound context from child loggers into each line", function () {
    const {logger, lines} = createMemoryLogger("publisher");

    logger.child({boardId: 2}).info("board-published", {clock: "t1"});

    expect(lines).to.deep.equal([
      {level: "info", message: "board-published", context: {boardId: 2, clock: "t1"}}
    ]);
  });

  it("serializes bigint and Error values", function () {
    const {logger, lines} = createMemoryLogger("publisher");

    logger.warn("write-failed", {gasPrice: 1_600_000n, error: new Error("boom")});

    expect(lines[0].context?.gasPrice).to.equal("1600000");
    expect(lines[0].context?.error).to.deep.include({name: "Error", message: "boom"});
  });

  it("omits the context key when there is nothing to report", function () {
    const {logger, lines} = createMemoryLogger("publisher");

    logger.info("publish-loop-stopped");

    expect(lines[0]).to.deep.equal({level: "info", message: "publish-loop-stopped", context: undefined});
  });
});
