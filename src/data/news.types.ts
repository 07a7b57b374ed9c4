import { NewsItem } from '../core/types';

export interface NewsProvider {
  recentNews(ticker: string, limit: number): Promise<NewsItem[]>;
}

export class EmptyNewsProvider implements NewsProvider {
  async recentNews(_ticker: string, _limit: number): Promise<NewsItem[]> {
    return [];
  }
}
