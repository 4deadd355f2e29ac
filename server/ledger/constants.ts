export const FEE_COLLECTOR_ADDRESS = 'fee_collector';
export const GENESIS_HASH = 'GENESIS';
export const ADDRESS_PREFIX = 'nft1';
export const DEFAULT_GEN_TX_GAS = 1_000_000;
