export { fetchText, HttpRequestError } from './http';

export type { FetchOptions, FetchedPage } from './http';
