/**
 * Chain helpers for the configured payment network.
 */

const BASE_MAINNET_CHAIN_ID = 8453;
const BASE_SEPOLIA_CHAIN_ID = 84532;

export function isTestnet(network: string): boolean {
  const name = network.toLowerCase();
  return name.includes('sepolia') || name.includes('test');
}

export function getChainId(network: string): number {
  return isTestnet(network) ? BASE_SEPOLIA_CHAIN_ID : BASE_MAINNET_CHAIN_ID;
}
