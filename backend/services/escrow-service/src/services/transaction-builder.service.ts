import { getAddress, toQuantity } from 'ethers';
import { erc20Interface, escrowInterface } from '../blockchain/abi';
import { ChainClient, ContractCall, applyGasBuffer } from '../blockchain/chain-client';
import { ESCROW_TYPE_ENUM, assertEnumMappings } from '../blockchain/enum-mappings';
import { ExtraDataRequest, OracleSources, encodeExtraData } from '../blockchain/extra-data';
import { DEFAULT_GAS, GAS_BUFFER } from '../config/constants';
import type { EscrowType } from '../types/escrow.types';
import type {
  ApproveTokenTx,
  CancelListingTx,
  CreateListingTx,
  DeliverAction,
  DeliverListingTx,
  DisputeListingTx,
  FillListingTx,
  ResolveListingTx,
  TransactionEnvelope,
  WalletTransactionRequest,
} from '../types/transaction.types';
import { toMinorUnits } from '../utils/amounts';
import type { Fallback } from '../utils/fallback';
import { logger } from '../utils/logger';

export interface OracleSettings {
  subscriptionId: bigint;
  donId: string;
  secretsSlot: number;
  secretsVersion: bigint;
  callbackGasLimit: number;
  encryptedSecretsUrls: string;
  sources: OracleSources;
}

type GasBuffer = { numerator: bigint; denominator: bigint };

const FILL_GAS: Readonly<Record<EscrowType, bigint>> = {
  disputable: DEFAULT_GAS.FILL_DISPUTABLE,
  onchain_approval: DEFAULT_GAS.FILL_ONCHAIN_APPROVAL,
  api_approval: DEFAULT_GAS.FILL_API_APPROVAL,
};

const DELIVERY: Readonly<Record<EscrowType, { action: DeliverAction; gas: bigint }>> = {
  disputable: { action: 'deliverDisputableListing', gas: DEFAULT_GAS.DELIVER_DISPUTABLE },
  onchain_approval: { action: 'deliverOnchainApprovalListing', gas: DEFAULT_GAS.DELIVER_ONCHAIN_APPROVAL },
  api_approval: { action: 'deliverApiApprovalListing', gas: DEFAULT_GAS.DELIVER_API_APPROVAL },
};

export interface CreateListingParams {
  listingId: string;
  tokenAddress: string;
  amount: bigint;
  expiration: number;
  escrowType: EscrowType;
  from?: string;
}

export interface ApproveTokenParams {
  tokenAddress: string;
  amount: bigint;
  from?: string;
}

export interface FillListingParams {
  listingId: string;
  deadline: number;
  extraData: ExtraDataRequest;
  from?: string;
}

export interface DeliverListingParams {
  listingId: string;
  escrowType: EscrowType;
  from?: string;
}

export interface ResolveListingParams {
  listingId: string;
  toBuyer: boolean;
  from?: string;
}

export interface ListingActionParams {
  listingId: string;
  from?: string;
}

export interface CancelListingParams extends ListingActionParams {
  by: 'seller' | 'buyer';
}

/**
 * Builds unsigned escrow transactions for the active network.
 *
 * Every descriptor carries a gas limit. With a sender the node is asked for an
 * estimate, buffered 1.2x (1.5x for oracle-backed delivery); without one, or
 * when estimation fails, the action's fixed default is used instead.
 */
export class TransactionBuilder {
  private log = logger.child({ component: 'TransactionBuilder' });

  constructor(
    private readonly chain: ChainClient,
    private readonly oracle: OracleSettings
  ) {
    assertEnumMappings();
  }

  get escrowAddress(): string {
    return this.chain.escrowAddress;
  }

  get chainId(): number {
    return this.chain.network.chainId;
  }

  /**
   * Resolves the token's decimals, then scales a decimal amount into minor units.
   */
  async scaleAmount(
    amount: string,
    tokenAddress: string
  ): Promise<{ minorUnits: bigint; decimals: Fallback<number> }> {
    const decimals = await this.chain.tokenDecimals(tokenAddress);
    return { minorUnits: toMinorUnits(amount, decimals.value), decimals };
  }

  async buildCreateListing(params: CreateListingParams): Promise<CreateListingTx> {
    const tokenAddress = getAddress(params.tokenAddress);
    const call = this.escrowCall('createListing', [
      params.listingId,
      tokenAddress,
      params.amount,
      params.expiration,
      ESCROW_TYPE_ENUM[params.escrowType],
    ]);

    return {
      action: 'createListing',
      ...(await this.envelope(call, DEFAULT_GAS.CREATE_LISTING, params.from)),
      listingId: params.listingId,
      tokenAddress,
      amount: params.amount,
      expiration: params.expiration,
      escrowType: params.escrowType,
    };
  }

  /**
   * ERC-20 approve granting the escrow contract `amount`. Sent to the token.
   */
  async buildApproveToken(params: ApproveTokenParams): Promise<ApproveTokenTx> {
    const tokenAddress = getAddress(params.tokenAddress);
    const call: ContractCall = {
      to: tokenAddress,
      data: erc20Interface.encodeFunctionData('approve', [this.escrowAddress, params.amount]),
    };

    return {
      action: 'approveToken',
      ...(await this.envelope(call, DEFAULT_GAS.APPROVE_TOKEN, params.from)),
      tokenAddress,
      spender: this.escrowAddress,
      amount: params.amount,
    };
  }

  async buildFillListing(params: FillListingParams): Promise<FillListingTx> {
    const extraData = encodeExtraData(
      params.extraData,
      this.oracle.sources,
      this.oracle.encryptedSecretsUrls
    );
    const call = this.escrowCall('fillListing', [params.listingId, params.deadline, extraData]);

    return {
      action: 'fillListing',
      ...(await this.envelope(call, FILL_GAS[params.extraData.escrowType], params.from)),
      listingId: params.listingId,
      deadline: params.deadline,
      extraData,
    };
  }

  async buildDeliverListing(params: DeliverListingParams): Promise<DeliverListingTx> {
    const { action, gas } = DELIVERY[params.escrowType];

    if (action === 'deliverApiApprovalListing') {
      const { secretsSlot, secretsVersion, subscriptionId, callbackGasLimit, donId } = this.oracle;
      const call = this.escrowCall(action, [
        params.listingId,
        [],
        [],
        secretsSlot,
        secretsVersion,
        subscriptionId,
        callbackGasLimit,
        donId,
      ]);
      return {
        action,
        ...(await this.envelope(call, gas, params.from, 0n, GAS_BUFFER.ORACLE_CALLBACK)),
        listingId: params.listingId,
      };
    }

    const call = this.escrowCall(action, [params.listingId]);
    return {
      action,
      ...(await this.envelope(call, gas, params.from)),
      listingId: params.listingId,
    };
  }

  /**
   * `toBuyer = false` releases the funds to the seller (buyer acceptance).
   */
  async buildResolveListing(params: ResolveListingParams): Promise<ResolveListingTx> {
    const call = this.escrowCall('resolveListing', [params.listingId, params.toBuyer]);

    return {
      action: 'resolveListing',
      ...(await this.envelope(call, DEFAULT_GAS.RESOLVE_LISTING, params.from)),
      listingId: params.listingId,
      toBuyer: params.toBuyer,
    };
  }

  async buildDisputeListing(params: ListingActionParams): Promise<DisputeListingTx> {
    const entropyFee = await this.chain.entropyFee();
    const call = this.escrowCall('disputeListing', [params.listingId]);

    if (entropyFee.wasFallback) {
      this.log.warn('Using fallback entropy fee for dispute', {
        listingId: params.listingId,
        feeWei: entropyFee.value,
      });
    }

    return {
      action: 'disputeListing',
      ...(await this.envelope(call, DEFAULT_GAS.DISPUTE_LISTING, params.from, entropyFee.value)),
      listingId: params.listingId,
      entropyFee,
    };
  }

  async buildCancelListing(params: CancelListingParams): Promise<CancelListingTx> {
    const action = params.by === 'seller' ? 'cancelListingBySeller' : 'cancelListingByBuyer';
    const call = this.escrowCall(action, [params.listingId]);

    return {
      action,
      ...(await this.envelope(call, DEFAULT_GAS.CANCEL_LISTING, params.from)),
      listingId: params.listingId,
    };
  }

  private escrowCall(method: string, args: readonly unknown[]): ContractCall {
    return {
      to: this.escrowAddress,
      data: escrowInterface.encodeFunctionData(method, args),
    };
  }

  private async envelope(
    call: ContractCall,
    defaultGas: bigint,
    from?: string,
    value: bigint = 0n,
    buffer: GasBuffer = GAS_BUFFER.STANDARD
  ): Promise<TransactionEnvelope> {
    const base = { to: call.to, value, chainId: this.chainId, data: call.data };

    if (!from) {
      return { ...base, gas: defaultGas, gasSource: 'default' };
    }

    const sender = getAddress(from);
    const estimate = await this.chain.estimateGas(call, sender, value);
    if (!estimate.ok) {
      this.log.debug('Using default gas limit', { to: call.to, gas: defaultGas, reason: estimate.reason });
      return { ...base, from: sender, gas: defaultGas, gasSource: 'default' };
    }

    const gas = buffer === GAS_BUFFER.STANDARD ? estimate.gas : applyGasBuffer(estimate.raw, buffer);
    return { ...base, from: sender, gas, gasSource: 'estimate' };
  }
}

/**
 * Renders a descriptor as eth_sendTransaction parameters.
 */
export function toWalletRequest(tx: TransactionEnvelope): WalletTransactionRequest {
  return {
    to: tx.to,
    ...(tx.from ? { from: tx.from } : {}),
    value: toQuantity(tx.value),
    data: tx.data,
    gas: toQuantity(tx.gas),
    chainId: toQuantity(tx.chainId),
  };
}
