import { type BigNumber, providers, utils } from "ethers";
import { toMonitorError } from "./errors";
import type { ChainBlock, ChainTransaction } from "./types";

export interface ChainDataSource {
  /** Balance in ether units as a decimal string. */
  getBalance(address: string): Promise<string>;
  getTransactionCount(address: string): Promise<number>;
  getBlockNumber(): Promise<number>;
  getBlock(blockTag: number | "latest"): Promise<ChainBlock | null>;
}

interface RpcTransaction {
  hash: string;
  from: string;
  to?: string;
  value: BigNumber;
  blockNumber?: number;
  gasLimit: BigNumber;
  gasPrice?: BigNumber;
}

interface RpcBlock {
  number: number;
  timestamp: number;
  transactions: RpcTransaction[];
}

/** The part of an ethers provider the client reads through. */
export interface ChainProvider {
  getBalance(address: string): Promise<BigNumber>;
  getTransactionCount(address: string): Promise<number>;
  getBlockNumber(): Promise<number>;
  getBlockWithTransactions(blockTag: number | string): Promise<RpcBlock | null>;
}

const toChainTransaction = (
  tx: RpcTransaction,
  blockNumber: number,
  timestamp: number,
): ChainTransaction => ({
  hash: tx.hash,
  from: tx.from,
  to: tx.to ?? null,
  value: utils.formatEther(tx.value),
  blockNumber: tx.blockNumber ?? blockNumber,
  timestamp,
  gasLimit: tx.gasLimit.toString(),
  gasPrice: tx.gasPrice ? tx.gasPrice.toString() : null,
});

/**
 * JSON-RPC reader for the EVM side. Provider errors leave this class as tagged
 * MonitorErrors so retry policies can match them by kind.
 */
export class EvmChainClient implements ChainDataSource {
  private readonly provider: ChainProvider;

  constructor(rpcUrl: string, timeoutMs: number, provider?: ChainProvider) {
    this.provider =
      provider ??
      new providers.StaticJsonRpcProvider({
        url: rpcUrl,
        timeout: timeoutMs,
      });
  }

  async getBalance(address: string): Promise<string> {
    const wei = await this.call(() => this.provider.getBalance(address));
    return utils.formatEther(wei);
  }

  getTransactionCount(address: string): Promise<number> {
    return this.call(() => this.provider.getTransactionCount(address));
  }

  getBlockNumber(): Promise<number> {
    return this.call(() => this.provider.getBlockNumber());
  }

  async getBlock(blockTag: number | "latest"): Promise<ChainBlock | null> {
    const block = await this.call(() =>
      this.provider.getBlockWithTransactions(blockTag),
    );
    if (!block) {
      return null;
    }
    return {
      number: block.number,
      timestamp: block.timestamp,
      transactions: block.transactions.map((tx) =>
        toChainTransaction(tx, block.number, block.timestamp),
      ),
    };
  }

  private async call<T>(request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error: unknown) {
      throw toMonitorError(error, "DataUnavailable");
    }
  }
}
