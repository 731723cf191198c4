/**
 * Engine setup for the SessionGuard MCP server.
 * Reads config from environment variables and wires one in-process wallet:
 * store, validator registry, session-key validator and optional ECDSA owner.
 */
import { getAddress, isAddress, type Address } from 'viem';
import { EcdsaValidator } from '../wallet/ecdsa.js';
import { WalletValidatorRegistry } from '../wallet/registry.js';
import { ValidatorStore } from '../validator/store.js';
import type { ValidatorEventListener } from '../validator/types.js';
import { SessionKeyValidator } from '../validator/validator.js';

/** Entry point v0.6 */
export const DEFAULT_ENTRY_POINT: Address = '0x5FF137D4b0FDCD49DcA30c7CF57E578a026d2789';

// ─── Config types ──────────────────────────────────────────────────────────

export interface SessionGuardConfig {
  /** Wallet whose permissions the server manages */
  walletAddress: Address;
  /** Address the session-key validator is registered under */
  validatorAddress: Address;
  /** Chain ID bound into permits (default: 1) */
  chainId: number;
  /** Entry point used for user operation hashes */
  entryPointAddress: Address;
  /** Wallet owner; enables an ECDSA sudo validator when set */
  ownerAddress?: Address;
  /** Address of that ECDSA validator */
  sudoValidatorAddress?: Address;
}

// ─── Config loader ─────────────────────────────────────────────────────────

/**
 * Load configuration from environment variables.
 * Only WALLET_ADDRESS and VALIDATOR_ADDRESS are required to get started.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SessionGuardConfig {
  const walletAddress = requireAddress(env, 'WALLET_ADDRESS', 'the wallet whose operators are managed');
  const validatorAddress = requireAddress(env, 'VALIDATOR_ADDRESS', 'the session-key validator address');

  const chainId = parseInt(env['CHAIN_ID'] ?? '1', 10);
  if (!Number.isSafeInteger(chainId) || chainId <= 0) {
    throw new Error(`CHAIN_ID must be a positive integer, got "${env['CHAIN_ID']}".`);
  }

  const entryPointAddress = optionalAddress(env, 'ENTRY_POINT_ADDRESS') ?? DEFAULT_ENTRY_POINT;
  const ownerAddress = optionalAddress(env, 'OWNER_ADDRESS');
  const sudoValidatorAddress = optionalAddress(env, 'SUDO_VALIDATOR_ADDRESS');

  if (ownerAddress && !sudoValidatorAddress) {
    throw new Error('SUDO_VALIDATOR_ADDRESS is required when OWNER_ADDRESS is set.');
  }

  return {
    walletAddress,
    validatorAddress,
    chainId,
    entryPointAddress,
    ownerAddress,
    sudoValidatorAddress,
  };
}

function requireAddress(env: NodeJS.ProcessEnv, name: string, meaning: string): Address {
  const value = env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required. Set it to ${meaning}.`);
  }
  return parseAddress(name, value);
}

function optionalAddress(env: NodeJS.ProcessEnv, name: string): Address | undefined {
  const value = env[name];
  return value ? parseAddress(name, value) : undefined;
}

function parseAddress(name: string, value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new Error(`${name} must be a 0x-prefixed 20-byte hex string (42 chars total).`);
  }
  return getAddress(value);
}

// ─── Engine factory ────────────────────────────────────────────────────────

export interface SessionGuardEngine {
  config: SessionGuardConfig;
  store: ValidatorStore;
  registry: WalletValidatorRegistry;
  sessionKeys: SessionKeyValidator;
  owner?: EcdsaValidator;
}

/**
 * Build the engine for the configured wallet. The session-key validator is
 * enabled as a normal validator; the owner's ECDSA validator (if any) as sudo.
 */
export function createEngine(config: SessionGuardConfig, onEvent?: ValidatorEventListener): SessionGuardEngine {
  const store = new ValidatorStore();
  const registry = new WalletValidatorRegistry();
  const sessionKeys = new SessionKeyValidator({
    address: config.validatorAddress,
    chainId: config.chainId,
    store,
    registry,
    onEvent,
  });
  registry.enableValidator(config.walletAddress, sessionKeys, 'normal');

  let owner: EcdsaValidator | undefined;
  if (config.ownerAddress && config.sudoValidatorAddress) {
    owner = new EcdsaValidator(config.sudoValidatorAddress);
    owner.setOwner(config.walletAddress, config.ownerAddress);
    registry.enableValidator(config.walletAddress, owner, 'sudo');
  }

  return { config, store, registry, sessionKeys, owner };
}

// ─── Singleton accessor ────────────────────────────────────────────────────

let _config: SessionGuardConfig | null = null;
let _engine: SessionGuardEngine | null = null;
let _onEvent: ValidatorEventListener | undefined;

/**
 * Get the singleton config (loaded once from env).
 * Throws a descriptive error if env vars are missing.
 */
export function getConfig(): SessionGuardConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/** Listener passed to the engine when it is first created. */
export function setEventListener(listener: ValidatorEventListener): void {
  _onEvent = listener;
}

/**
 * Get the singleton engine.
 * Lazily initialized on first call.
 */
export function getEngine(): SessionGuardEngine {
  if (!_engine) {
    _engine = createEngine(getConfig(), _onEvent);
  }
  return _engine;
}

/**
 * Reset singletons (for testing only).
 */
export function _resetSingletons(): void {
  _config = null;
  _engine = null;
  _onEvent = undefined;
}
