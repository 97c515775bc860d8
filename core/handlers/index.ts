import { CrawlMode } from '../crawler.types';
import { CreatorHandler } from './creator-handler';
import { DetailHandler } from './detail-handler';
import { HomefeedHandler } from './homefeed-handler';
import { SearchHandler } from './search-handler';
import { HandlerDeps, ModeHandler } from './session';

export function createHandler(mode: CrawlMode, deps: HandlerDeps): ModeHandler {
  switch (mode) {
    case 'search':
      return new SearchHandler(deps);
    case 'detail':
      return new DetailHandler(deps);
    case 'creator':
      return new CreatorHandler(deps);
    case 'homefeed':
      return new HomefeedHandler(deps);
  }
}

export { CreatorHandler, DetailHandler, HomefeedHandler, SearchHandler };
export { CrawlSession } from './session';
export type { HandlerDeps, ModeHandler } from './session';
