// src/services/shopDirectory.ts: lookup of a user's shops in the shop service
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { AppConfig } from '@/config/app.config';
import { DependencyError } from '@/utils/errors';

/** Shop as returned by the shop service. */
export interface ShopRecord {
  id: number;
  name: string;
  latitude: number | null;
  longitude: number | null;
}

export type DirectoryResult =
  | { success: true; shops: ShopRecord[] }
  | { success: false; error: DependencyError };

export interface ShopDirectoryClient {
  /**
   * Shops owned by `subjectId`, in the order the directory returns them.
   * `credential` is the caller's own bearer token, forwarded as-is.
   */
  listOwnedShops(subjectId: string, credential: string): Promise<DirectoryResult>;
}

const coordinateSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .transform(Number)
  .refine(Number.isFinite, 'coordinate must be a number')
  .nullable()
  .optional()
  .transform((value) => value ?? null);

const shopIdSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/, 'shop id must be an integer').transform(Number),
]);

const shopRecordSchema = z.object({
  id: shopIdSchema,
  name: z.string(),
  latitude: coordinateSchema,
  longitude: coordinateSchema,
});

// DRF-style services answer either with a bare list or a paginated envelope
const responseSchema = z.union([
  z.array(shopRecordSchema),
  z.object({ results: z.array(shopRecordSchema) }).transform((page) => page.results),
]);

function describeFailure(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) return `status ${err.response.status}`;
    return err.code ?? err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/** {@link ShopDirectoryClient} over HTTP. One attempt per call, bounded by the configured timeout. */
export class HttpShopDirectoryClient implements ShopDirectoryClient {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: Pick<AppConfig, 'shopService'>,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        timeout: config.shopService.timeoutMs,
        validateStatus: (status) => status === 200,
      });
  }

  async listOwnedShops(subjectId: string, credential: string): Promise<DirectoryResult> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>(this.config.shopService.url, {
        params: { owner_id: subjectId },
        headers: { Authorization: `Bearer ${credential}` },
      });
      body = response.data;
    } catch (err) {
      return {
        success: false,
        error: new DependencyError('directory_unavailable', describeFailure(err)),
      };
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        success: false,
        error: new DependencyError('directory_unavailable', 'unexpected response shape'),
      };
    }

    if (parsed.data.length === 0) {
      return { success: false, error: new DependencyError('no_shops_found') };
    }

    return { success: true, shops: parsed.data };
  }
}
