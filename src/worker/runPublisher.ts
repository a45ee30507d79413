import {ApolloServer} from "@apollo/server";
import dotenv from "dotenv";
import {ApiContext} from "../api/resolvers";
import {createServer, startStatusApi} from "../api/server";
import {loadPublisherConfig} from "../config";
import {createDb} from "../db/db";
import {PublishStateRepo} from "../db/repo";
import {FileFeeLedger} from "../services/FeeLedger";
import {GasPriceController} from "../services/GasPriceController";
import {createLogger} from "../shared/logger";
import {buildWorkers} from "./buildWorkers";

const logger = createLogger("runPublisher");

async function main() {
  dotenv.config();
  const config = loadPublisherConfig();

  const db = await createDb(config.stateDbPath);
  const repo = new PublishStateRepo(db, config.stateDbPath);
  const feeLedger = new FileFeeLedger(config.feeLedgerPath);
  const workers = buildWorkers(config, {repo, feeLedger});

  for (const worker of workers) {
    logger.info("board-worker-ready", {
      boardId: worker.board.boardId,
      tokenId: worker.board.tokenId,
      boardPath: worker.board.boardPath,
      endpoints: config.rpcUrls.length
    });
  }

  let server: ApolloServer<ApiContext> | null = null;
  if (config.statusApiPort !== undefined) {
    server = createServer();
    const gasPrices = new Map<number, GasPriceController>(
      workers.map((worker): [number, GasPriceController] => [worker.board.boardId, worker.gasPrice])
    );
    await startStatusApi(server, {repo, feeLedger, gasPrices}, config.statusApiPort);
  }

  const shutdown = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info("shutdown-requested", {signal});
    shutdown.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  await Promise.all(workers.map((worker) => worker.loop.run(shutdown.signal)));
  if (server) {
    await server.stop();
  }
}

main().catch((error) => {
  logger.error("publisher-process-failed", {error});
  process.exitCode = 1;
});
