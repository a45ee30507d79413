import {IFeeLedger} from "../interfaces/IFeeLedger";
import {IPublishStateRepository} from "../interfaces/IPublishStateRepository";
import {GasPriceController} from "../services/GasPriceController";
import {FeeLedgerSnapshot} from "../types/ledger.types";
import {PublishAttempt} from "../types/publish.types";

export interface ApiContext {
  repo: IPublishStateRepository;
  feeLedger: IFeeLedger;
  /** Live gas price controllers, keyed by board id. */
  gasPrices: ReadonlyMap<number, GasPriceController>;
}

function toGraphAttempt(attempt: PublishAttempt) {
  return {
    id: String(attempt.id),
    boardId: attempt.boardId,
    clock: attempt.clock,
    status: attempt.status,
    endpoint: attempt.endpoint,
    txHash: attempt.txHash,
    gasPriceWei: attempt.gasPrice,
    fee: attempt.fee,
    createdAt: String(attempt.createdAt)
  };
}

function encodeCursor(id: number): string {
  return Buffer.from(`attempt:${id}`, "utf8").toString("base64");
}

function decodeCursor(cursor: string | null | undefined): number | undefined {
  if (!cursor) {
    return undefined;
  }

  const decoded = Buffer.from(cursor, "base64").toString("utf8");
  const match = /^attempt:(\d+)$/.exec(decoded);
  if (!match) {
    throw new Error("invalid-cursor");
  }
  return Number(match[1]);
}

function asPositiveFirst(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error("first must be a positive integer");
  }
  if (value > 100) {
    throw new Error("first cannot be greater than 100");
  }
  return value;
}

export const resolvers = {
  Query: {
    health: () => "ok",
    board: (_: unknown, args: {boardId: number}, ctx: ApiContext) => {
      const controller = ctx.gasPrices.get(args.boardId);
      return {
        boardId: args.boardId,
        lastPublishedClock: ctx.repo.getLastPublishedClock(args.boardId),
        gasPriceWei: controller ? controller.current.toString() : null
      };
    },
    publishAttempts: (
      _: unknown,
      args: {boardId?: number | null; first: number; after?: string | null},
      ctx: ApiContext
    ) => {
      const first = asPositiveFirst(args.first);
      const after = decodeCursor(args.after);

      const rows = ctx.repo.listAttempts({boardId: args.boardId ?? undefined, first: first + 1, after});
      const hasNextPage = rows.length > first;
      const pageRows = hasNextPage ? rows.slice(0, first) : rows;

      const edges = pageRows.map((row) => ({cursor: encodeCursor(row.id), node: toGraphAttempt(row)}));
      return {
        edges,
        pageInfo: {
          endCursor: edges.length > 0 ? edges[edges.length - 1].cursor : null,
          hasNextPage
        }
      };
    },
    feeLedger: (_: unknown, __: unknown, ctx: ApiContext): Promise<FeeLedgerSnapshot> => ctx.feeLedger.read()
  }
};
