export { Application, type ApplicationOptions } from './app/index.js';
export { initConfig, type CertificateConfig, type KeyStoreConfig, type LogConfig, type SignatureConfig } from './app/config.js';
export { initLogger, logger } from './app/logger.js';

export {
  AuthenticationError,
  CertificateIntegrityError,
  DecryptionError,
  IdentityError,
  KeyGenerationError,
  MalformedEnvelopeError,
  RevocationStoreError,
  TrustError,
  UntrustedRecipientError,
  UntrustedSignerError,
  isTrustError,
} from './errors.js';

export {
  buildSelfSignedCertificate,
  describeCertificate,
  describePublicKey,
  parseCertificate,
} from './certificates/certificate.js';
export type {
  Certificate,
  CertificateDetails,
  Identity,
  KeyPair,
  PublicKeyDetails,
} from './certificates/types.js';

export { KeyManager, TrustSnapshot, type KeyManagerConfig, type TrustStatus } from './keys/key-manager.js';
export { KeyStore, keyStoreRecordSchema, type KeyStoreRecord } from './keystore/key-store.js';
export { CryptoManager, type CryptoManagerConfig } from './crypto/crypto-manager.js';
export type {
  DetachedSignature,
  EncryptedEnvelope,
  SignerIdentity,
  VerificationResult,
  VerificationStatus,
} from './crypto/types.js';

export {
  ENVELOPE_FORMAT,
  exportEnvelope,
  importEnvelope,
  importPackage,
  type EnvelopeMetadata,
  type ImportedPackage,
} from './sharing/sharing-protocol.js';

export { IdentityVault, type IdentityVaultConfig, type UnlockedIdentity } from './identity/identity-vault.js';

export { MemoryRevocationStore } from './revocation/memory-store.js';
export { FileRevocationStore, type FileRevocationStoreOptions } from './revocation/file-store.js';
export type { RevocationEntry, RevocationStore } from './revocation/types.js';
