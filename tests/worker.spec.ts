import {expect} from "chai";
import {unlink, writeFile} from "node:fs/promises";
import {join} from "node:path";
import {createDb} from "../src/db/db";
import {PublishStateRepo} from "../src/db/repo";
import {IDocumentSubmitter} from "../src/interfaces/IDocumentSubmitter";
import {createMemoryLogger} from "../src/shared/logger";
import {publishTick} from "../src/worker/publishTick";
import {acceptedResult, failedResult, makeWorkspace, ScriptedSubmitter, TEMPLATE, writeBoard} from "./helpers/fixtures";

describe("publishTick", function () {
  let boardPath: string;
  let templatePath: string;
  let repo: PublishStateRepo;
  const now = 1_700_000_000;

  beforeEach(async function () {
    const dir = await makeWorkspace();
    boardPath = join(dir, "board2.txt");
    templatePath = join(dir, "template.html");
    await writeFile(templatePath, TEMPLATE, "utf8");
    repo = new PublishStateRepo(await createDb());
  });

  function tick(submitter: IDocumentSubmitter, at = now) {
    return publishTick({
      boardId: 2,
      boardPath,
      templatePath,
      submitter,
      state: repo,
      now: at,
      logger: createMemoryLogger("publishTick").logger
    });
  }

  it("renders the board without its clock line and publishes it", async function () {
    await writeBoard(boardPath, ["A", "B", "Timestamp: t1"]);
    const submitter = new ScriptedSubmitter(acceptedResult());

    const result = await tick(submitter);

    expect(result).to.deep.equal({boardId: 2, action: "published", clock: "t1"});
    expect(submitter.documents).to.deep.equal(['<html>2|t1|["A","B"]</html>']);
    expect(repo.getLastPublishedClock(2)).to.equal("t1");
  });

  it("does not write again while the clock is unchanged", async function () {
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    const submitter = new ScriptedSubmitter(acceptedResult());

    await tick(submitter);
    await writeBoard(boardPath, ["A edited", "Timestamp: t1"]);
    const second = await tick(submitter, now + 60);

    expect(second.action).to.equal("unchanged");
    expect(submitter.documents).to.have.length(1);
  });

  it("retries the newest clock after a failed publish", async function () {
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    const submitter = new ScriptedSubmitter(acceptedResult(), failedResult(), acceptedResult());
    await tick(submitter);

    await writeBoard(boardPath, ["A", "B", "Timestamp: t2"]);
    const failed = await tick(submitter, now + 60);
    expect(failed).to.deep.equal({boardId: 2, action: "failed", clock: "t2"});
    expect(repo.getLastPublishedClock(2)).to.equal("t1");

    const retried = await tick(submitter, now + 120);
    expect(retried.action).to.equal("published");
    expect(submitter.documents[1]).to.equal('<html>2|t2|["A","B"]</html>');
    expect(submitter.documents[2]).to.equal(submitter.documents[1]);
    expect(repo.getLastPublishedClock(2)).to.equal("t2");
  });

  it("records every attempt that reached the submitter", async function () {
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    const submitter = new ScriptedSubmitter(failedResult(), acceptedResult("http://rpc-b"));

    await tick(submitter);
    await tick(submitter, now + 60);

    const attempts = repo.listAttempts({boardId: 2, first: 10});
    expect(attempts.map((attempt) => attempt.status)).to.deep.equal(["failed", "published"]);
    expect(attempts[1]).to.deep.include({
      clock: "t1",
      endpoint: "http://rpc-b",
      txHash: "0x01",
      gasPrice: "1300000",
      fee: "0.0000001300",
      createdAt: now + 60
    });
  });

  it("waits while the board file is missing or empty", async function () {
    const submitter = new ScriptedSubmitter();

    const missing = await tick(submitter);
    await writeFile(boardPath, "", "utf8");
    const empty = await tick(submitter);

    expect(missing).to.deep.equal({boardId: 2, action: "waiting", clock: null});
    expect(empty).to.deep.equal({boardId: 2, action: "waiting", clock: null});
    expect(submitter.documents).to.have.length(0);
  });

  it("treats a board deleted after publishing as a pause, not a reset", async function () {
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    const submitter = new ScriptedSubmitter(acceptedResult());
    await tick(submitter);

    await unlink(boardPath);
    const waiting = await tick(submitter, now + 60);
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    const unchanged = await tick(submitter, now + 120);

    expect(waiting.action).to.equal("waiting");
    expect(unchanged.action).to.equal("unchanged");
    expect(submitter.documents).to.have.length(1);
  });

  it("flags a board whose last line is not a clock", async function () {
    await writeBoard(boardPath, ["A", "B"]);
    const submitter = new ScriptedSubmitter();

    const result = await tick(submitter);

    expect(result).to.deep.equal({boardId: 2, action: "malformed", clock: null});
    expect(submitter.documents).to.have.length(0);
  });

  it("fails the cycle without submitting when the template is unreadable", async function () {
    await writeBoard(boardPath, ["A", "Timestamp: t1"]);
    await unlink(templatePath);
    const submitter = new ScriptedSubmitter();

    const result = await tick(submitter);

    expect(result).to.deep.equal({boardId: 2, action: "failed", clock: "t1"});
    expect(submitter.documents).to.have.length(0);
    expect(repo.listAttempts({first: 10})).to.have.length(0);
  });
});
