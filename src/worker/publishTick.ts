import {IDocumentSubmitter} from "../interfaces/IDocumentSubmitter";
import {IPublishStateRepository} from "../interfaces/IPublishStateRepository";
import {createLogger, Logger} from "../shared/logger";
import {TickResult} from "../types/publish.types";
import {readBoardSource} from "./boardSource";
import {loadTemplate, renderDocument} from "./renderDocument";

export interface WorkerContext {
  boardId: number;
  boardPath: string;
  templatePath: string;
  submitter: IDocumentSubmitter;
  state: IPublishStateRepository;
  /** Unix seconds for this cycle. */
  now: number;
  logger?: Logger;
}

const defaultLogger = createLogger("publishTick");

/**
 * One poll cycle for one board. `lastPublishedClock` only ever moves to a
 * clock whose write was confirmed, so a failed cycle retries the same content
 * next time and an unchanged clock costs nothing.
 */
export async function publishTick(ctx: WorkerContext): Promise<TickResult> {
  const logger = ctx.logger ?? defaultLogger;
  const {boardId} = ctx;

  const source = await readBoardSource(ctx.boardPath);
  if (source.kind === "missing") {
    logger.info("board-file-missing", {path: ctx.boardPath});
    return {boardId, action: "waiting", clock: null};
  }
  if (source.kind === "empty") {
    logger.info("board-file-empty", {path: ctx.boardPath});
    return {boardId, action: "waiting", clock: null};
  }
  if (source.kind === "malformed") {
    logger.warn("board-file-missing-clock", {path: ctx.boardPath, lastLine: source.lastLine});
    return {boardId, action: "malformed", clock: null};
  }

  const {clock, lines} = source;
  if (ctx.state.getLastPublishedClock(boardId) === clock) {
    logger.info("board-unchanged", {clock});
    return {boardId, action: "unchanged", clock};
  }
  logger.info("board-update-detected", {clock, lines: lines.length});

  let document: string;
  try {
    const template = await loadTemplate(ctx.templatePath);
    document = renderDocument(template, {lines, boardId, clock});
  } catch (error: unknown) {
    logger.error("document-render-failed", {clock, error});
    return {boardId, action: "failed", clock};
  }

  const result = await ctx.submitter.submit(document);
  if (!result.ok) {
    ctx.state.recordAttempt({boardId, clock, status: "failed", now: ctx.now});
    logger.warn("board-publish-failed", {clock});
    return {boardId, action: "failed", clock};
  }

  ctx.state.markPublished(boardId, clock, ctx.now);
  ctx.state.recordAttempt({
    boardId,
    clock,
    status: "published",
    endpoint: result.endpoint,
    txHash: result.txHash,
    gasPrice: result.gasPrice,
    fee: result.fee,
    now: ctx.now
  });
  logger.info("board-published", {clock, endpoint: result.endpoint, txHash: result.txHash, fee: result.fee});
  return {boardId, action: "published", clock};
}
