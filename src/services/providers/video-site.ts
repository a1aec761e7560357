import * as cheerio from 'cheerio';
import { requestText } from '../http.js';

export interface VideoEntry {
  title: string;
  /** Absolute play page URL, null when the result has none */
  playUrl: string | null;
  coverUrl: string | null;
  plot: string;
  actors: string[];
  year: string;
  area: string;
}

export const NO_PLOT = '无剧情简介';

const MAX_PLOT_LENGTH = 200;
const PLOT_LABEL = '剧情：';

export function cleanPlot(raw: string): string {
  const plot = raw.replace(/\s+/g, ' ').trim();
  if (!plot) {
    return NO_PLOT;
  }
  return plot.length > MAX_PLOT_LENGTH ? `${plot.slice(0, MAX_PLOT_LENGTH - 3)}...` : plot;
}

/**
 * Parse a MacCMS-style search results page into entries
 */
export function parseSearchPage(html: string, baseUrl: string): VideoEntry[] {
  const $ = cheerio.load(html);

  return $('.module-search-item')
    .toArray()
    .map((element) => {
      const item = $(element);

      const playPath = item.find('.module-item-pic a').first().attr('href');
      const actors = item
        .find('.video-info-actor a')
        .toArray()
        .map((actor) => $(actor).text().trim())
        .filter((name) => name.length > 0);

      // The plot sits in the .video-info-item next to a "剧情：" label
      let plot = NO_PLOT;
      const label = item
        .find('.video-info-itemtitle')
        .toArray()
        .find((el) => $(el).text().includes(PLOT_LABEL));
      if (label) {
        const content = $(label).parent().find('.video-info-item').first();
        if (content.length > 0) {
          plot = cleanPlot(content.text());
        }
      } else {
        const block = item
          .find('.video-info-items')
          .toArray()
          .find((el) => $(el).text().includes(PLOT_LABEL));
        if (block) {
          const content = $(block).find('.video-info-item').first();
          const text = content.length > 0 ? content.text() : $(block).text().split(PLOT_LABEL)[1] ?? '';
          plot = cleanPlot(text);
        }
      }

      return {
        title: item.find('h3 a').first().attr('title') ?? '未知标题',
        playUrl: playPath ? `${baseUrl}${playPath}` : null,
        coverUrl: item.find('.module-item-pic img').first().attr('data-src') ?? null,
        plot,
        actors: actors.length > 0 ? actors : ['未知'],
        year: item.find('.tag-link a[href*="year"]').first().text().trim() || '未知年份',
        area: item.find('.tag-link a[href*="area"]').first().text().trim() || '未知地区',
      };
    });
}

export interface VideoSiteOptions {
  baseUrl: string;
  timeoutMs: number;
}

/**
 * Search client for a video site without an API; results come from its
 * HTML search page.
 */
export class VideoSiteClient {
  readonly name = 'video-site';

  private options: VideoSiteOptions;

  constructor(options: VideoSiteOptions) {
    this.options = options;
  }

  async search(keyword: string): Promise<VideoEntry[]> {
    const html = await requestText({
      provider: this.name,
      url: `${this.options.baseUrl}/index.php/vod/search.html`,
      method: 'GET',
      query: { wd: keyword },
      headers: {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'zh-CN,zh;q=0.9',
      },
      timeoutMs: this.options.timeoutMs,
    });
    return parseSearchPage(html, this.options.baseUrl);
  }
}
