export { ClipboardMode } from './clipboard-mode.js';
export { ErrorCode } from './error-code.js';
export { SecretSourceKind } from './secret-source-kind.js';
