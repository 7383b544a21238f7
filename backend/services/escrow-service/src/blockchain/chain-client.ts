import { JsonRpcProvider, getAddress, isError } from 'ethers';
import { FALLBACKS, GAS_BUFFER } from '../config/constants';
import { ConnectionError, VerificationError, errorMessage } from '../errors';
import type { ListingOnChain } from '../types/escrow.types';
import { Fallback, actual, fallback } from '../utils/fallback';
import { logger } from '../utils/logger';
import { erc20Interface, escrowInterface } from './abi';
import { decodeEscrowType, decodeListingState } from './enum-mappings';
import type { NetworkInfo } from './network-registry';

const log = logger.child({ component: 'ChainClient' });

export interface ContractCall {
  to: string;
  data: string;
}

export type GasEstimate =
  | { ok: true; raw: bigint; gas: bigint }
  | { ok: false; reason: string };

export interface ReceiptLog {
  address: string;
  topics: readonly string[];
  data: string;
}

export interface ReceiptSummary {
  txHash: string;
  to: string | null;
  from: string;
  blockNumber: number;
  gasUsed: bigint;
  logs: ReceiptLog[];
}

/**
 * Everything the escrow core needs from a node. Reads that may fail
 * transiently return Fallback values; receipt verification throws.
 */
export interface ChainClient {
  readonly network: NetworkInfo;
  readonly escrowAddress: string;

  readListing(listingId: string): Promise<ListingOnChain>;
  estimateGas(call: ContractCall, from: string, value?: bigint): Promise<GasEstimate>;
  waitForReceipt(txHash: string, timeoutSeconds: number): Promise<ReceiptSummary>;
  isTokenWhitelisted(tokenAddress: string): Promise<Fallback<boolean>>;
  tokenDecimals(tokenAddress: string): Promise<Fallback<number>>;
  tokenAllowance(tokenAddress: string, owner: string, spender: string): Promise<Fallback<bigint>>;
  tokenBalance(tokenAddress: string, owner: string): Promise<Fallback<bigint>>;
  entropyFee(): Promise<Fallback<bigint>>;
}

export interface ReceiptLike {
  hash: string;
  to: string | null;
  from: string;
  status: number | null;
  blockNumber: number;
  gasUsed: bigint;
  logs: readonly ReceiptLog[];
}

/**
 * The subset of an ethers provider used here. JsonRpcProvider satisfies it;
 * tests pass a stub.
 */
export interface RpcProvider {
  send(method: string, params: unknown[]): Promise<unknown>;
  call(tx: { to: string; data: string }): Promise<string>;
  estimateGas(tx: { to: string; from: string; data: string; value: bigint }): Promise<bigint>;
  waitForTransaction(hash: string, confirms?: number, timeout?: number): Promise<ReceiptLike | null>;
}

export function applyGasBuffer(raw: bigint, buffer: { numerator: bigint; denominator: bigint }): bigint {
  // integer ceil(raw * numerator / denominator)
  return (raw * buffer.numerator + buffer.denominator - 1n) / buffer.denominator;
}

export interface EthersChainClientOptions {
  network: NetworkInfo;
  escrowAddress: string;
  provider?: RpcProvider;
}

export class EthersChainClient implements ChainClient {
  readonly network: NetworkInfo;
  readonly escrowAddress: string;
  private readonly provider: RpcProvider;

  constructor(provider: RpcProvider, network: NetworkInfo, escrowAddress: string) {
    this.provider = provider;
    this.network = network;
    this.escrowAddress = getAddress(escrowAddress);
  }

  /**
   * Opens a client and checks the node reports the configured chain id.
   */
  static async connect(options: EthersChainClientOptions): Promise<EthersChainClient> {
    const { network } = options;
    const provider =
      options.provider ?? new JsonRpcProvider(network.rpcUrl, network.chainId, { staticNetwork: true });

    let reported: bigint;
    try {
      reported = BigInt(String(await provider.send('eth_chainId', [])));
    } catch (error) {
      log.error('Blockchain node unreachable', {
        network: network.name,
        rpcUrl: network.rpcUrl,
        error: errorMessage(error),
      });
      throw new ConnectionError(`Cannot reach ${network.name} node at ${network.rpcUrl}`, {
        network: network.name,
        cause: errorMessage(error),
      });
    }

    if (reported !== BigInt(network.chainId)) {
      throw new ConnectionError(`Node at ${network.rpcUrl} reports chain ${reported}, expected ${network.chainId}`, {
        network: network.name,
        expected: network.chainId,
        reported: reported.toString(),
      });
    }

    log.info('Blockchain connection successful', { network: network.name, chainId: network.chainId });
    return new EthersChainClient(provider, network, options.escrowAddress);
  }

  async readListing(listingId: string): Promise<ListingOnChain> {
    const raw = await this.provider.call({
      to: this.escrowAddress,
      data: escrowInterface.encodeFunctionData('getListing', [listingId]),
    });
    const [listing] = escrowInterface.decodeFunctionResult('getListing', raw);

    return {
      listingId: String(listing.listingId),
      buyer: getAddress(String(listing.buyer)),
      seller: getAddress(String(listing.seller)),
      token: getAddress(String(listing.token)),
      amount: BigInt(listing.amount),
      expiration: Number(listing.expiration),
      deadline: Number(listing.deadline),
      state: decodeListingState(Number(listing.state)),
      escrowType: decodeEscrowType(Number(listing.escrowType)),
    };
  }

  async estimateGas(call: ContractCall, from: string, value: bigint = 0n): Promise<GasEstimate> {
    try {
      const raw = await this.provider.estimateGas({ to: call.to, from, data: call.data, value });
      return { ok: true, raw, gas: applyGasBuffer(raw, GAS_BUFFER.STANDARD) };
    } catch (error) {
      const reason = errorMessage(error);
      log.warn('Gas estimation failed', { to: call.to, from, reason });
      return { ok: false, reason };
    }
  }

  async waitForReceipt(txHash: string, timeoutSeconds: number): Promise<ReceiptSummary> {
    let receipt: ReceiptLike | null;
    try {
      receipt = await this.provider.waitForTransaction(txHash, 1, timeoutSeconds * 1000);
    } catch (error) {
      if (isError(error, 'TIMEOUT')) {
        throw VerificationError.timeout(txHash, timeoutSeconds);
      }
      log.error('Receipt lookup failed', { network: this.network.name, txHash, error: errorMessage(error) });
      throw new ConnectionError(`Cannot fetch receipt for ${txHash} from ${this.network.name}`, {
        network: this.network.name,
        txHash,
        cause: errorMessage(error),
      });
    }

    if (!receipt) {
      throw VerificationError.receiptNotFound(txHash);
    }
    if (receipt.status !== 1) {
      throw VerificationError.failed(txHash);
    }

    return {
      txHash: receipt.hash,
      to: receipt.to,
      from: receipt.from,
      blockNumber: receipt.blockNumber,
      gasUsed: receipt.gasUsed,
      logs: receipt.logs.map((entry) => ({ address: entry.address, topics: [...entry.topics], data: entry.data })),
    };
  }

  async isTokenWhitelisted(tokenAddress: string): Promise<Fallback<boolean>> {
    return this.readWithFallback<boolean>('isTokenWhitelisted', FALLBACKS.TOKEN_WHITELISTED, async () => {
      const raw = await this.provider.call({
        to: this.escrowAddress,
        data: escrowInterface.encodeFunctionData('isTokenWhitelisted', [tokenAddress]),
      });
      const [whitelisted] = escrowInterface.decodeFunctionResult('isTokenWhitelisted', raw);
      return Boolean(whitelisted);
    });
  }

  async tokenDecimals(tokenAddress: string): Promise<Fallback<number>> {
    return this.readWithFallback<number>('decimals', FALLBACKS.TOKEN_DECIMALS, async () => {
      const raw = await this.provider.call({
        to: tokenAddress,
        data: erc20Interface.encodeFunctionData('decimals'),
      });
      const [decimals] = erc20Interface.decodeFunctionResult('decimals', raw);
      return Number(decimals);
    });
  }

  async tokenAllowance(tokenAddress: string, owner: string, spender: string): Promise<Fallback<bigint>> {
    return this.readWithFallback<bigint>('allowance', FALLBACKS.TOKEN_ALLOWANCE, async () => {
      const raw = await this.provider.call({
        to: tokenAddress,
        data: erc20Interface.encodeFunctionData('allowance', [owner, spender]),
      });
      const [allowance] = erc20Interface.decodeFunctionResult('allowance', raw);
      return BigInt(allowance);
    });
  }

  async tokenBalance(tokenAddress: string, owner: string): Promise<Fallback<bigint>> {
    return this.readWithFallback<bigint>('balanceOf', FALLBACKS.TOKEN_BALANCE, async () => {
      const raw = await this.provider.call({
        to: tokenAddress,
        data: erc20Interface.encodeFunctionData('balanceOf', [owner]),
      });
      const [balance] = erc20Interface.decodeFunctionResult('balanceOf', raw);
      return BigInt(balance);
    });
  }

  async entropyFee(): Promise<Fallback<bigint>> {
    return this.readWithFallback<bigint>('getFee', FALLBACKS.ENTROPY_FEE_WEI, async () => {
      const raw = await this.provider.call({
        to: this.escrowAddress,
        data: escrowInterface.encodeFunctionData('getFee'),
      });
      const [fee] = escrowInterface.decodeFunctionResult('getFee', raw);
      return BigInt(fee);
    });
  }

  private async readWithFallback<T>(method: string, substitute: T, read: () => Promise<T>): Promise<Fallback<T>> {
    try {
      return actual(await read());
    } catch (error) {
      log.warn('Chain read failed, using fallback', {
        method,
        fallback: substitute,
        error: errorMessage(error),
      });
      return fallback(substitute);
    }
  }
}
