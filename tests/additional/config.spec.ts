import {expect} from "chai";
import {join} from "node:path";
import {loadPublisherConfig} from "../../src/config";
import {createMemoryLogger} from "../../src/shared/logger";
import {TEST_WRITE_KEY} from "../helpers/fixtures";

const baseEnv: Record<string, string> = {
  CONTRACT_ADDRESS: `0x${"11".repeat(20)}`,
  RPC_URLS: "http://localhost:8545, http://localhost:8546,",
  CHAIN_ID: "31337",
  WRITE_KEY: TEST_WRITE_KEY,
  BOARD_IDS: "0,2",
  PRIVATE_KEY0: `0x${"01".repeat(32)}`,
  PRIVATE_KEY2: `0x${"02".repeat(32)}`,
  TOKEN_ID2: "9"
};

describe("loadPublisherConfig", function () {
  it("reads the environment and fills in defaults", function () {
    const {logger} = createMemoryLogger("config");

    const config = loadPublisherConfig(baseEnv, logger);

    expect(config.rpcUrls).to.deep.equal(["http://localhost:8545", "http://localhost:8546"]);
    expect(config.chainId).to.equal(31337n);
    expect(config.gasPrice).to.deep.equal({baseWei: 1_300_000n, maxWei: 3_000_000n, stepWei: 300_000n});
    expect(config.gasLimit).to.equal(29_504_000n);
    expect(config.receiptTimeoutMs).to.equal(60_000);
    expect(config.pollIntervalMs).to.equal(60_000);
    expect(config.feeLedgerPath).to.equal("fee.txt");
    expect(config.stateDbPath).to.equal(undefined);
    expect(config.boards.map((board) => board.boardPath)).to.deep.equal([join(".", "board0.txt"), join(".", "board2.txt")]);
  });

  it("defaults the token id to the board id with a warning", function () {
    const {logger, lines} = createMemoryLogger("config");

    const config = loadPublisherConfig({...baseEnv, TOKEN_ID2: "nine"}, logger);

    expect(config.boards.map((board) => board.tokenId)).to.deep.equal([0n, 2n]);
    expect(lines.map((line) => line.message)).to.deep.equal(["token-id-defaulted", "token-id-invalid-defaulted"]);
  });

  it("takes tunables from the environment", function () {
    const config = loadPublisherConfig(
      {...baseEnv, GAS_PRICE_BASE_WEI: "1000", GAS_PRICE_MAX_WEI: "5000", POLL_INTERVAL_MS: "5", STATE_DB_PATH: "state.sqlite"},
      createMemoryLogger("config").logger
    );

    expect(config.gasPrice.baseWei).to.equal(1000n);
    expect(config.gasPrice.maxWei).to.equal(5000n);
    expect(config.pollIntervalMs).to.equal(5);
    expect(config.stateDbPath).to.equal("state.sqlite");
  });

  it("treats blank values as unset", function () {
    const config = loadPublisherConfig({...baseEnv, STATE_DB_PATH: "  "}, createMemoryLogger("config").logger);

    expect(config.stateDbPath).to.equal(undefined);
  });

  it("names missing required variables", function () {
    const {CONTRACT_ADDRESS: _omitted, ...env} = baseEnv;

    expect(() => loadPublisherConfig(env, createMemoryLogger("config").logger)).to.throw(
      "missing-env:CONTRACT_ADDRESS"
    );
  });

  it("names the private key a board is missing", function () {
    expect(() =>
      loadPublisherConfig({...baseEnv, BOARD_IDS: "0,3"}, createMemoryLogger("config").logger)
    ).to.throw("missing-env:PRIVATE_KEY3");
  });

  it("rejects a malformed write key", function () {
    expect(() =>
      loadPublisherConfig({...baseEnv, WRITE_KEY: "0x1234"}, createMemoryLogger("config").logger)
    ).to.throw("invalid-env:WRITE_KEY");
  });

  it("rejects a gas cap below the base price", function () {
    expect(() =>
      loadPublisherConfig({...baseEnv, GAS_PRICE_MAX_WEI: "1"}, createMemoryLogger("config").logger)
    ).to.throw("invalid-env:GAS_PRICE_MAX_WEI");
  });
});
