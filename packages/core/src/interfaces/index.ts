export type { IClipboardSink } from './clipboard-sink.interface.js';
export type { IConfirmer } from './confirmer.interface.js';
export type { DecryptResult, IEncryptionBackend } from './encryption-backend.interface.js';
export type { ISecretInputResolver } from './secret-input.interface.js';
export type { IVersionControl } from './version-control.interface.js';
