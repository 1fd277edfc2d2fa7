/**
 * Host binding
 *
 * Any class can opt into field-level encryption by holding a `FieldCrypt`
 * bound to itself. The binding owns the class's cached private key and
 * exposes the four operations.
 *
 * @example
 * ```ts
 * class Customer {
 *   static readonly crypt = cryptFor(Customer);
 *   private sealedTaxId = '';
 *
 *   set taxId(value: string) {
 *     this.sealedTaxId = Customer.crypt.encrypt(value);
 *   }
 *
 *   get taxId(): unknown {
 *     return Customer.crypt.decrypt(this.sealedTaxId);
 *   }
 * }
 *
 * Customer.crypt.privateKey(process.env.CUSTOMER_KEY);
 * ```
 */

import type { KeyInput, KeyOwner } from '../crypto/keys.js';

import type { CryptPipeline, EncryptOptions } from './crypt-pipeline.js';
import { getDefaultPipeline } from './default.js';

/**
 * The capability a host type gains
 */
export interface Encryptable {
  encrypt(value: unknown, key?: KeyInput, options?: EncryptOptions): string;
  decrypt(token: string, key?: KeyInput): unknown;
  encryptWithPassword(value: unknown, password: string, options?: EncryptOptions): string;
  decryptWithPassword(token: string, password: string): unknown;
}

export class FieldCrypt implements Encryptable {
  constructor(
    readonly owner: KeyOwner,
    private readonly boundPipeline?: CryptPipeline
  ) {}

  /**
   * Without an explicit pipeline, resolved on every call so that settings
   * configured after the binding was created still apply.
   */
  get pipeline(): CryptPipeline {
    return this.boundPipeline ?? getDefaultPipeline();
  }

  /**
   * Return the owner's cached key, generating it on first access, or assign
   * `value` as the new cached key. The result is a copy, so clearing the
   * cache leaves it intact.
   */
  privateKey(value?: KeyInput): Buffer {
    const { keys } = this.pipeline;
    return value === undefined ? keys.getOrCreateCachedKey(this.owner) : keys.setCachedKey(this.owner, value);
  }

  /**
   * New random key; not cached
   */
  generateKey(): Buffer {
    return this.pipeline.keys.generateKey();
  }

  encrypt(value: unknown, key: KeyInput = this.privateKey(), options?: EncryptOptions): string {
    return this.pipeline.encryptWithKey(value, key, options);
  }

  decrypt(token: string, key: KeyInput = this.privateKey()): unknown {
    return this.pipeline.decryptWithKey(token, key);
  }

  encryptWithPassword(value: unknown, password: string, options?: EncryptOptions): string {
    return this.pipeline.encryptWithPassword(value, password, options);
  }

  decryptWithPassword(token: string, password: string): unknown {
    return this.pipeline.decryptWithPassword(token, password);
  }
}

export function cryptFor(owner: KeyOwner, pipeline?: CryptPipeline): FieldCrypt {
  return new FieldCrypt(owner, pipeline);
}
