import { generateKeyPairSync } from 'crypto';
import fs from 'fs';
import { ensureDirExistence } from '../utils/ensureDirExistence.js';

/**
 * Reads the PEM host key, generating a 2048-bit RSA key on first start.
 * A generated key is only readable by its owner.
 */
export function loadOrCreateHostKey(keyPath: string): Buffer {
    if (fs.existsSync(keyPath)) {
        return fs.readFileSync(keyPath);
    }

    ensureDirExistence(keyPath);
    const { privateKey } = generateKeyPairSync('rsa', {
        modulusLength: 2048,
        publicKeyEncoding: { type: 'spki', format: 'pem' },
        privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
    });
    fs.writeFileSync(keyPath, privateKey, { mode: 0o600 });
    console.info(`Generated new host key at ${keyPath}`);

    return Buffer.from(privateKey);
}
