import {setTimeout as sleep} from "node:timers/promises";
import {IDocumentSubmitter} from "../interfaces/IDocumentSubmitter";
import {IPublishStateRepository} from "../interfaces/IPublishStateRepository";
import {createLogger, Logger} from "../shared/logger";
import {TickResult} from "../types/publish.types";
import {publishTick} from "./publishTick";

export interface PublishLoopOptions {
  boardId: number;
  boardPath: string;
  templatePath: string;
  pollIntervalMs: number;
  submitter: IDocumentSubmitter;
  state: IPublishStateRepository;
  nowSeconds?: () => number;
  logger?: Logger;
  /** Called after every cycle, including failed ones. */
  onTick?: (result: TickResult) => void;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * Strictly sequential poll, maybe submit, sleep. A cycle failure is logged and
 * the loop carries on; only the abort signal ends it.
 */
export class PublishLoop {
  private readonly logger: Logger;
  private readonly nowSeconds: () => number;

  constructor(private readonly options: PublishLoopOptions) {
    this.logger = options.logger ?? createLogger("publishLoop", {boardId: options.boardId});
    this.nowSeconds = options.nowSeconds ?? (() => Math.floor(Date.now() / 1000));
  }

  async runOnce(): Promise<TickResult> {
    try {
      return await publishTick({
        boardId: this.options.boardId,
        boardPath: this.options.boardPath,
        templatePath: this.options.templatePath,
        submitter: this.options.submitter,
        state: this.options.state,
        now: this.nowSeconds(),
        logger: this.logger
      });
    } catch (error: unknown) {
      this.logger.error("publish-cycle-failed", {error});
      return {boardId: this.options.boardId, action: "error", clock: null};
    }
  }

  async run(signal?: AbortSignal): Promise<void> {
    this.logger.info("publish-loop-started", {
      boardPath: this.options.boardPath,
      pollIntervalMs: this.options.pollIntervalMs
    });

    while (!signal?.aborted) {
      const result = await this.runOnce();
      this.options.onTick?.(result);
      if (signal?.aborted) {
        break;
      }

      try {
        await sleep(this.options.pollIntervalMs, undefined, {signal});
      } catch (error: unknown) {
        if (!isAbortError(error)) {
          throw error;
        }
      }
    }

    this.logger.info("publish-loop-stopped");
  }
}
