import platform from './platform.json';

export const DEFAULT_PLATFORM = 'dy';

export const PLATFORM_API_BASE_URL: string = platform.apiBaseUrl;
export const PLATFORM_ORIGIN: string = platform.origin;
export const DEFAULT_USER_AGENT: string = platform.defaultUserAgent;

/** Sent with every signed request, after the operation's own params. */
export const COMMON_PARAMS: Readonly<Record<string, string>> = Object.freeze({ ...platform.commonParams });

/** Device params of the unsigned feed endpoint, which ignores COMMON_PARAMS. */
export const FEED_PARAMS: Readonly<Record<string, string>> = Object.freeze({ ...platform.feedParams });

export const SIGNATURE_PARAM = 'a_bogus';

/** Cookies copied into the query of every signed request. */
export const VERIFY_COOKIES = ['msToken', 'webid'] as const;

export const API_PATHS = {
  selfCheck: '/aweme/v1/web/history/read/',
  searchPage: '/aweme/v1/web/general/search/single/',
  itemDetail: '/aweme/v1/web/aweme/detail/',
  commentPage: '/aweme/v1/web/comment/list/',
  subCommentPage: '/aweme/v1/web/comment/list/reply/',
  profile: '/aweme/v1/web/user/profile/other/',
  userPostPage: '/aweme/v1/web/aweme/post/',
  feedPage: '/aweme/v1/web/module/feed/',
} as const;

export const PAGE_SIZES = {
  search: 10,
  comments: 20,
  userPosts: 18,
  feed: 20,
} as const;

export const APP_STATUS = {
  OK: 0,
  PARTIAL: 1,
  NOT_LOGGED_IN: 8,
  ACCOUNT_ERRORS: [10007, 10008],
} as const;

export const SEARCH_SORT_TYPES = {
  GENERAL: 0,
  MOST_LIKE: 1,
  LATEST: 2,
} as const;

export const PUBLISH_TIME_TYPES = {
  UNLIMITED: 0,
  ONE_DAY: 1,
  ONE_WEEK: 7,
  SIX_MONTH: 180,
} as const;

export const CONTENT_URL_PREFIX = `${PLATFORM_ORIGIN}/video/`;
