import { pbkdf2Sync, createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { IntegrityError } from './errors.js';
import { ENCRYPTION_KDF } from './format.js';

/**
 * Payload encryption: AES-256-GCM with a PBKDF2-SHA256 derived key.
 * The caller supplies the additional authenticated data (the artifact's
 * canonical metadata) so header tampering fails authentication.
 */

export interface EncryptionParams {
    kdf: typeof ENCRYPTION_KDF;
    iterations: number;
    salt: Uint8Array;  // 16 bytes
    nonce: Uint8Array; // 12 bytes
    tag: Uint8Array;   // 16 bytes
}

/**
 * Derives a 256-bit key from a password and salt using PBKDF2-SHA256.
 */
export function deriveKey(password: string, salt: Uint8Array, iterations: number): Buffer {
    return pbkdf2Sync(password, Buffer.from(salt), iterations, 32, 'sha256');
}

/**
 * Generates a random 16-byte salt and 12-byte nonce.
 */
export function generateEncryptionSecrets(): { salt: Uint8Array; nonce: Uint8Array } {
    return {
        salt: new Uint8Array(randomBytes(16)),
        nonce: new Uint8Array(randomBytes(12))
    };
}

export function encryptPayload(
    data: Uint8Array,
    password: string,
    iterations: number,
    aad: Uint8Array
): { ciphertext: Uint8Array; params: EncryptionParams } {
    const { salt, nonce } = generateEncryptionSecrets();
    const key = deriveKey(password, salt, iterations);
    const cipher = createCipheriv('aes-256-gcm', key, nonce);
    cipher.setAAD(aad);

    const ciphertext = Buffer.concat([cipher.update(data), cipher.final()]);
    return {
        ciphertext: new Uint8Array(ciphertext),
        params: {
            kdf: ENCRYPTION_KDF,
            iterations,
            salt,
            nonce,
            tag: new Uint8Array(cipher.getAuthTag())
        }
    };
}

export function decryptPayload(
    ciphertext: Uint8Array,
    password: string,
    params: EncryptionParams,
    aad: Uint8Array
): Uint8Array {
    const key = deriveKey(password, params.salt, params.iterations);
    const decipher = createDecipheriv('aes-256-gcm', key, params.nonce);
    decipher.setAAD(aad);
    decipher.setAuthTag(params.tag);

    try {
        const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
        return new Uint8Array(plaintext);
    } catch (err) {
        throw new IntegrityError(
            `Payload decryption failed. Possible wrong password or tampered data: ${err instanceof Error ? err.message : String(err)}`,
            err
        );
    }
}
