// Gas limits used when an estimate is unavailable (no sender, or the node refused)
export const DEFAULT_GAS = {
  CREATE_LISTING: 200_000n,
  APPROVE_TOKEN: 100_000n,
  FILL_DISPUTABLE: 250_000n,
  FILL_ONCHAIN_APPROVAL: 300_000n,
  FILL_API_APPROVAL: 500_000n, // triggers an oracle request
  DELIVER_DISPUTABLE: 150_000n,
  DELIVER_ONCHAIN_APPROVAL: 200_000n,
  DELIVER_API_APPROVAL: 500_000n,
  RESOLVE_LISTING: 200_000n,
  DISPUTE_LISTING: 300_000n,
  CANCEL_LISTING: 150_000n,
} as const;

// Safety margins applied to a successful estimate, as numerator/denominator
export const GAS_BUFFER = {
  STANDARD: { numerator: 6n, denominator: 5n }, // 1.2x
  ORACLE_CALLBACK: { numerator: 3n, denominator: 2n }, // 1.5x
} as const;

// Values substituted when a chain read fails
export const FALLBACKS = {
  TOKEN_DECIMALS: 6, // PYUSD / USDC / USDT
  ENTROPY_FEE_WEI: 10n ** 15n, // 0.001 ETH
  TOKEN_WHITELISTED: false,
  TOKEN_ALLOWANCE: 0n,
  TOKEN_BALANCE: 0n,
} as const;

export const TIME = {
  SECONDS_PER_DAY: 86_400,
} as const;

export const LISTING_CONSTRAINTS = {
  MIN_DURATION_DAYS: 1,
  MAX_DURATION_DAYS: 365,
  MIN_DEADLINE_DAYS: 1,
  MAX_DEADLINE_DAYS: 365,
  DEFAULT_DEADLINE_DAYS: 7,
  MAX_TITLE_LENGTH: 200,
  MAX_DESCRIPTION_LENGTH: 5000,
  MAX_PRICE_DECIMALS: 18,
} as const;

export const DISPUTE_CONSTRAINTS = {
  MAX_REASON_LENGTH: 2000,
} as const;
