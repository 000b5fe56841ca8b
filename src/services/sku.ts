import { randomInt } from 'crypto';

const SKU_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const SKU_LENGTH = 8;

export type SkuGenerator = () => string;

/** Random 8-character SKU of uppercase letters and digits. */
export const generateSku: SkuGenerator = () => {
  let sku = '';
  for (let i = 0; i < SKU_LENGTH; i++) {
    sku += SKU_ALPHABET[randomInt(SKU_ALPHABET.length)];
  }
  return sku;
};
