/**
 * Application - wires the trust subsystem from configuration
 *
 * One revocation store is shared by every component, so a revocation made
 * through any of them is seen by all trust checks.
 */

import {
  getCertificateConfig,
  getIdentityConfig,
  getKeyStoreConfig,
  getLogConfig,
  getRevocationConfig,
  getSignatureConfig,
  initConfig,
  isConfigInitialized,
} from './config.js';
import { initLogger, isLoggerInitialized, logger } from './logger.js';
import { resolveProjectPath } from './paths.js';
import { KeyManager } from '../keys/key-manager.js';
import { KeyStore } from '../keystore/key-store.js';
import { CryptoManager } from '../crypto/crypto-manager.js';
import { IdentityVault } from '../identity/identity-vault.js';
import { FileRevocationStore } from '../revocation/file-store.js';
import type { RevocationStore } from '../revocation/types.js';

export interface ApplicationOptions {
  /** Replaces the configured file-backed revocation list */
  revocationStore?: RevocationStore;
  /** Replaces identity.usersDir */
  usersDir?: string;
  now?: () => Date;
}

export class Application {
  readonly revocationStore: RevocationStore;
  readonly keyManager: KeyManager;
  readonly keyStore: KeyStore;
  readonly cryptoManager: CryptoManager;
  readonly identities: IdentityVault;

  private constructor(options: ApplicationOptions) {
    this.revocationStore = options.revocationStore
      ?? new FileRevocationStore(resolveProjectPath(getRevocationConfig().path));

    const certificateConfig = getCertificateConfig();
    this.keyManager = new KeyManager({
      revocationStore: this.revocationStore,
      keySize: certificateConfig.keySize,
      validityDays: certificateConfig.validityDays,
      now: options.now,
    });
    this.keyStore = new KeyStore(getKeyStoreConfig());
    this.cryptoManager = new CryptoManager({
      keyManager: this.keyManager,
      maxSignatureAgeDays: getSignatureConfig().maxAgeDays,
    });
    this.identities = new IdentityVault({
      usersDir: options.usersDir ?? resolveProjectPath(getIdentityConfig().usersDir),
      keyManager: this.keyManager,
      keyStore: this.keyStore,
    });
  }

  /**
   * Create the application. Loads config and logger first if the embedding
   * program has not.
   */
  static create(options: ApplicationOptions = {}): Application {
    if (!isConfigInitialized()) initConfig();
    if (!isLoggerInitialized()) initLogger(getLogConfig());

    const app = new Application(options);
    logger.debug({ keyStoreIterations: getKeyStoreConfig().iterations }, 'Application initialized');
    return app;
  }
}
