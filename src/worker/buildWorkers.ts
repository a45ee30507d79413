import {BoardConfig, PublisherConfig} from "../config";
import {EthersLedgerEndpoint} from "../infrastructure/EthersLedgerEndpoint";
import {IFeeLedger} from "../interfaces/IFeeLedger";
import {ILedgerEndpoint} from "../interfaces/ILedgerEndpoint";
import {IPublishStateRepository} from "../interfaces/IPublishStateRepository";
import {GasPriceController} from "../services/GasPriceController";
import {TransactionSubmitter} from "../services/TransactionSubmitter";
import {createLogger, Logger, LogSink} from "../shared/logger";
import {PublishLoop} from "./PublishLoop";

export type EndpointFactory = (url: string, board: BoardConfig, logger: Logger) => ILedgerEndpoint;

export interface BoardWorker {
  board: BoardConfig;
  gasPrice: GasPriceController;
  submitter: TransactionSubmitter;
  loop: PublishLoop;
}

export interface WorkerDependencies {
  repo: IPublishStateRepository;
  feeLedger: IFeeLedger;
  createEndpoint?: EndpointFactory;
  /** Where worker log lines go; stdout and stderr when unset. */
  logSink?: LogSink;
}

export function ethersEndpointFactory(config: PublisherConfig): EndpointFactory {
  return (url, board, logger) =>
    new EthersLedgerEndpoint(
      {
        rpcUrl: url,
        chainId: config.chainId,
        contractAddress: config.contractAddress,
        signerPrivateKey: board.privateKey,
        requestTimeoutMs: config.rpcTimeoutMs
      },
      logger
    );
}

/**
 * One worker per board: its own gas price, its own endpoint clients and
 * signer. Only the fee ledger and the state store are shared.
 */
export function buildWorkers(config: PublisherConfig, deps: WorkerDependencies): BoardWorker[] {
  const createEndpoint = deps.createEndpoint ?? ethersEndpointFactory(config);

  return config.boards.map((board) => {
    const scoped = (scope: string) => createLogger(scope, {boardId: board.boardId}, deps.logSink);
    const gasPrice = new GasPriceController(config.gasPrice);
    const endpointLogger = scoped("ethersLedgerEndpoint");
    const endpoints = config.rpcUrls.map((url) => createEndpoint(url, board, endpointLogger));

    const submitter = new TransactionSubmitter(
      endpoints,
      gasPrice,
      deps.feeLedger,
      {
        tokenId: board.tokenId,
        writeKey: config.writeKey,
        gasLimit: config.gasLimit,
        receiptTimeoutMs: config.receiptTimeoutMs
      },
      scoped("transactionSubmitter")
    );

    const loop = new PublishLoop({
      boardId: board.boardId,
      boardPath: board.boardPath,
      templatePath: config.templatePath,
      pollIntervalMs: config.pollIntervalMs,
      submitter,
      state: deps.repo,
      logger: scoped("publishLoop")
    });

    return {board, gasPrice, submitter, loop};
  });
}
