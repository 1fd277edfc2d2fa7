export { CryptPipeline, type EncryptOptions } from './crypt-pipeline.js';
export { getDefaultPipeline } from './default.js';
export { FieldCrypt, cryptFor, type Encryptable } from './field-crypt.js';
