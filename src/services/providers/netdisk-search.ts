import { z } from 'zod';
import { requestJson } from '../http.js';
import { ProviderError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseProviderResponse } from './types.js';

/** QUARK for Quark drive shares, BDY for Baidu netdisk shares */
export type DiskType = 'QUARK' | 'BDY';

export interface ShareLink {
  title: string;
  url: string;
}

const QUARK_SHARE_PREFIX = 'https://pan.quark.cn/s/';

/** Share links must name the disk they belong to */
const LINK_MARKER: Record<DiskType, string> = {
  QUARK: 'quark',
  BDY: 'baidu',
};

const DiskSearchResponseSchema = z.object({
  code: z.number(),
  msg: z.string().nullish(),
  data: z
    .object({
      list: z
        .array(
          z
            .object({
              disk_name: z.string().nullish(),
              link: z.string().nullish(),
            })
            .passthrough()
        )
        .nullish(),
    })
    .passthrough()
    .nullish(),
});

const IndexSearchResponseSchema = z.object({
  code: z.number(),
  data: z
    .object({
      records: z
        .array(
          z
            .object({
              title: z.string().nullish(),
              shareUrl: z.string().nullish(),
            })
            .passthrough()
        )
        .nullish(),
    })
    .passthrough()
    .nullish(),
});

const ShareTokenResponseSchema = z.object({
  data: z.object({ stoken: z.string() }).passthrough().nullish(),
  message: z.string().nullish(),
});

/**
 * Share id of a Quark share link, e.g. "abc123" for https://pan.quark.cn/s/abc123#/list/...
 */
export function quarkShareId(url: string): string | null {
  const match = /pan\.quark\.cn\/s\/(\w+)/.exec(url);
  return match ? match[1] : null;
}

/** Search engines wrap the matched words in <em> */
function cleanTitle(title: string | null | undefined): string {
  return (title ?? '未知标题').replace(/<\/?em>/g, '').trim() || '未知标题';
}

export interface NetdiskSearchOptions {
  searchUrl: string;
  fallbackUrl?: string;
  shareCheckUrl: string;
  timeoutMs: number;
}

/**
 * Netdisk share search: a disk search API covering Quark and Baidu, an
 * optional secondary Quark index, and Quark's share API to tell live
 * shares from expired ones.
 */
export class NetdiskSearchClient {
  readonly name = 'netdisk-search';

  private options: NetdiskSearchOptions;

  constructor(options: NetdiskSearchOptions) {
    this.options = options;
  }

  /**
   * Disk search; only links on the requested disk are returned
   */
  async search(keyword: string, type: DiskType): Promise<ShareLink[]> {
    const body = await requestJson({
      provider: this.name,
      url: `${this.options.searchUrl}/v1/search/disk`,
      method: 'POST',
      timeoutMs: this.options.timeoutMs,
      body: {
        page: 1,
        q: keyword,
        user: '',
        exact: false,
        format: [],
        share_time: '',
        size: 15,
        type,
        exclude_user: [],
        adv_params: { wechat_pwd: '' },
      },
    });

    const parsed = parseProviderResponse(this.name, DiskSearchResponseSchema, body);
    if (parsed.code !== 200) {
      throw new ProviderError(this.name, parsed.msg ?? `API code ${String(parsed.code)}`);
    }

    return (parsed.data?.list ?? [])
      .map((item) => ({ title: cleanTitle(item.disk_name), url: item.link ?? '' }))
      .filter((link) => link.url.includes(LINK_MARKER[type]));
  }

  /**
   * Secondary Quark index
   *
   * @returns No links when no index is configured
   */
  async searchIndex(keyword: string): Promise<ShareLink[]> {
    if (this.options.fallbackUrl === undefined) {
      return [];
    }

    const body = await requestJson({
      provider: this.name,
      url: `${this.options.fallbackUrl}/index/search`,
      method: 'POST',
      timeoutMs: this.options.timeoutMs,
      body: { page: 1, pageSize: 20, searchText: keyword, fileType: 0 },
    });

    const parsed = parseProviderResponse(this.name, IndexSearchResponseSchema, body);
    if (parsed.code !== 200) {
      throw new ProviderError(this.name, `API code ${String(parsed.code)}`);
    }

    return (parsed.data?.records ?? [])
      .filter((record) => record.shareUrl)
      .map((record) => ({ title: cleanTitle(record.title), url: `${QUARK_SHARE_PREFIX}${record.shareUrl ?? ''}` }));
  }

  /**
   * Whether a Quark share can still be opened. Any failure counts as expired.
   */
  async isShareAlive(url: string): Promise<boolean> {
    const shareId = quarkShareId(url);
    if (!shareId) {
      return false;
    }

    try {
      const body = await requestJson({
        provider: this.name,
        url: `${this.options.shareCheckUrl}/1/clouddrive/share/sharepage/token`,
        method: 'POST',
        query: { pr: 'ucpro', fr: 'h5' },
        timeoutMs: this.options.timeoutMs,
        body: { pwd_id: shareId, passcode: '' },
      });
      const parsed = parseProviderResponse(this.name, ShareTokenResponseSchema, body);
      return Boolean(parsed.data);
    } catch (error) {
      logger.debug('Share check failed', { shareId, error: errorMessage(error) });
      return false;
    }
  }
}
