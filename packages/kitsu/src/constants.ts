export const KITSU_API_BASE_URL = 'https://kitsu.io/api/edge';

export const KITSU_API_BASE_URL_ENV = 'KITSU_API_BASE_URL';

/** Items per page for search and episode listings */
export const KITSU_PAGE_LIMIT = 10;
