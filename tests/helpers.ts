import fs from 'fs';
import os from 'os';
import path from 'path';
import jwt from 'jsonwebtoken';
import type { Principal } from '@/auth/claims';
import { loadConfig, type AppConfig } from '@/config/app.config';
import type { DirectoryResult, ShopDirectoryClient, ShopRecord } from '@/services/shopDirectory';
import { DependencyError } from '@/utils/errors';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET_KEY: TEST_SECRET,
    UPLOAD_PATH: fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-uploads-')),
    LOG_LEVEL: 'fatal',
    ...overrides,
  });
}

export function signToken(
  payload: Record<string, unknown>,
  options: jwt.SignOptions = { algorithm: 'HS256', expiresIn: 300 },
  secret: string = TEST_SECRET,
): string {
  return jwt.sign(payload, secret, options);
}

export function shopOwner(subjectId: string, shopIds?: number[]): Principal {
  return {
    claims: { subjectId, role: 'shop_owner', ...(shopIds && { shopIds }) },
    credential: `token-for-${subjectId}`,
  };
}

export function customer(subjectId: string): Principal {
  return { claims: { subjectId, role: 'customer' }, credential: `token-for-${subjectId}` };
}

export function shop(id: number, lat: number | null = 6.9271, lng: number | null = 79.8612): ShopRecord {
  return { id, name: `Shop ${id}`, latitude: lat, longitude: lng };
}

/** Directory stand-in returning a fixed answer and recording its calls. */
export class FakeShopDirectory implements ShopDirectoryClient {
  readonly calls: Array<{ subjectId: string; credential: string }> = [];

  constructor(public result: DirectoryResult) {}

  static owning(...shops: ShopRecord[]): FakeShopDirectory {
    if (shops.length === 0) {
      return new FakeShopDirectory({ success: false, error: new DependencyError('no_shops_found') });
    }
    return new FakeShopDirectory({ success: true, shops });
  }

  static unavailable(): FakeShopDirectory {
    return new FakeShopDirectory({
      success: false,
      error: new DependencyError('directory_unavailable', 'status 503'),
    });
  }

  async listOwnedShops(subjectId: string, credential: string): Promise<DirectoryResult> {
    this.calls.push({ subjectId, credential });
    return this.result;
  }
}

/** SKU generator replaying `values` in order. */
export function scriptedSkus(values: string[]): { next: () => string; calls: () => number } {
  let index = 0;
  return {
    next: () => {
      if (index >= values.length) throw new Error('scripted SKUs exhausted');
      return values[index++];
    },
    calls: () => index,
  };
}
