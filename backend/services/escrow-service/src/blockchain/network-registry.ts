import { getAddress } from 'ethers';
import { ContractKind, DEFAULT_NETWORK, NETWORKS, NetworkDefinition } from '../config/networks';
import { ConfigError } from '../errors';

export interface NetworkInfo {
  name: string;
  chainId: number;
  rpcUrl: string;
  explorerUrl: string;
}

export interface NetworkRegistryOptions {
  defaultNetwork?: string;
  // Replaces the RPC endpoint of the default network only
  rpcUrlOverride?: string;
  networks?: Readonly<Record<string, NetworkDefinition>>;
}

/**
 * Lookups over the static network table. Nothing here falls back to another
 * network or a placeholder address: an unconfigured combination is a
 * ConfigError.
 */
export class NetworkRegistry {
  private readonly networks: Readonly<Record<string, NetworkDefinition>>;
  private readonly defaultNetwork: string;
  private readonly rpcUrlOverride?: string;

  constructor(options: NetworkRegistryOptions = {}) {
    this.networks = options.networks ?? NETWORKS;
    this.defaultNetwork = options.defaultNetwork ?? DEFAULT_NETWORK;
    this.rpcUrlOverride = options.rpcUrlOverride;
    this.definition(this.defaultNetwork);
  }

  get defaultNetworkName(): string {
    return this.defaultNetwork;
  }

  resolveNetwork(name: string = this.defaultNetwork): NetworkInfo {
    const network = this.definition(name);
    const rpcUrl = name === this.defaultNetwork && this.rpcUrlOverride ? this.rpcUrlOverride : network.rpcUrl;
    return {
      name,
      chainId: network.chainId,
      rpcUrl,
      explorerUrl: network.explorerUrl,
    };
  }

  resolveContractAddress(networkName: string, kind: ContractKind): string {
    const address = this.definition(networkName).contracts[kind];
    if (!address) {
      throw ConfigError.contractNotDeployed(networkName, kind);
    }
    return getAddress(address);
  }

  resolveTokenAddress(networkName: string, symbol: string): string {
    const tokens = this.definition(networkName).tokens;
    const address = tokens[symbol.trim().toUpperCase()];
    if (!address) {
      throw ConfigError.unknownToken(networkName, symbol);
    }
    return getAddress(address);
  }

  supportedTokens(networkName: string = this.defaultNetwork): string[] {
    return Object.keys(this.definition(networkName).tokens);
  }

  explorerTxUrl(networkName: string, txHash: string): string {
    return `${this.definition(networkName).explorerUrl}/tx/${txHash}`;
  }

  private definition(name: string): NetworkDefinition {
    const network = Object.prototype.hasOwnProperty.call(this.networks, name) ? this.networks[name] : undefined;
    if (!network) {
      throw ConfigError.unknownNetwork(name);
    }
    return network;
  }
}
