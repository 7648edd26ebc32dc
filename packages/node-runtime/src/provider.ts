import { createCipheriv } from 'node:crypto';
import type { BlockCipherProvider, BlockEncryptor } from '../../core/src/providers/BlockCipherProvider.js';
import { TnsPackError } from '../../core/src/errors/index.js';

const DES_BLOCK = 8;
const EDE3_KEY  = 24;

export const nodeProvider: BlockCipherProvider = {
  createTripleDes(key: Uint8Array): BlockEncryptor {
    if (key.length !== EDE3_KEY) {
      throw new TnsPackError(`Triple DES needs a ${EDE3_KEY}-byte key, got ${key.length}`);
    }
    const keyCopy = Buffer.from(key);

    return {
      blockSize: DES_BLOCK,
      encryptBlock(block) {
        if (block.length !== DES_BLOCK) {
          throw new TnsPackError(`Triple DES encrypts ${DES_BLOCK}-byte blocks, got ${block.length}`);
        }
        // ECB has no IV; one cipher per block keeps every call independent
        const cipher = createCipheriv('des-ede3', keyCopy, null);
        cipher.setAutoPadding(false);
        const out = Buffer.concat([cipher.update(block), cipher.final()]);
        return new Uint8Array(out);
      },
    };
  },
};
