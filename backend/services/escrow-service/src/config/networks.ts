export type ContractKind = 'escrow' | 'arbiter' | 'functions_consumer';

export interface NetworkDefinition {
  chainId: number;
  rpcUrl: string;
  explorerUrl: string;
  // null until the contract is deployed on that network
  contracts: Record<ContractKind, string | null>;
  tokens: Record<string, string>;
}

export const DEFAULT_NETWORK = 'arbitrum_sepolia';

export const NETWORKS: Readonly<Record<string, NetworkDefinition>> = {
  arbitrum_sepolia: {
    chainId: 421614,
    rpcUrl: 'https://sepolia-rollup.arbitrum.io/rpc',
    explorerUrl: 'https://sepolia.arbiscan.io',
    contracts: {
      escrow: '0x8e601797f52AECD270484151Cc39C4074e0E861E',
      arbiter: '0xdc58De22A66c81672dA2D885944d343E9d2BFB04',
      functions_consumer: '0x0A77e401Ea1808e5d91314DE09f12072774b0953',
    },
    // Test deployment: every stablecoin symbol points at the same mock token
    tokens: {
      PYUSD: '0xC9C401E0094B2d3d796Ed074b023551038b84F07',
      USDC: '0xC9C401E0094B2d3d796Ed074b023551038b84F07',
      USDT: '0xC9C401E0094B2d3d796Ed074b023551038b84F07',
    },
  },
  arbitrum_one: {
    chainId: 42161,
    rpcUrl: 'https://arb1.arbitrum.io/rpc',
    explorerUrl: 'https://arbiscan.io',
    contracts: {
      escrow: null,
      arbiter: null,
      functions_consumer: null,
    },
    tokens: {
      USDC: '0xaf88d065e77c8cC2239327C5EDb3A432268e5831',
      USDT: '0xFd086bC7CD5C481DCC9C85ebE478A1C0b69FCbb9',
    },
  },
};
