/**
 * Shared Mocks
 * In-process stand-ins for the HTTP transport and for page sources
 */

import { FetchErrorType } from '../../lib/fetching/errors';
import type {
  FetchResult,
  HttpRequestInit,
  HttpResponse,
  PageSource,
} from '../../modules/linkmap/linkmap.types';

export interface FakeRoute {
  status: number;
  body?: string;
  delayMs?: number;
}

export type FakeRouteTable = Record<string, FakeRoute | Error>;

export const CONNECTION_REFUSED = 'connect ECONNREFUSED 127.0.0.1:80';

/**
 * The error shape Node's fetch rejects with when a socket cannot be opened
 */
export function createConnectionError(): TypeError {
  const cause = Object.assign(new Error(CONNECTION_REFUSED), { code: 'ECONNREFUSED' });
  return new TypeError('fetch failed', { cause });
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Mock transport answering from GET and HEAD route tables.
 * Unknown URLs fail like an unreachable host.
 */
export function createFakeTransport(routes: { get?: FakeRouteTable; head?: FakeRouteTable }) {
  return jest.fn<Promise<HttpResponse>, [string, HttpRequestInit]>(async (url, init) => {
    const table = init.method === 'HEAD' ? routes.head : routes.get;
    const route = table?.[url];

    if (route === undefined) {
      throw createConnectionError();
    }
    if (route instanceof Error) {
      throw route;
    }
    if (route.delayMs) {
      await delay(route.delayMs);
    }

    const body = route.body ?? '';
    return { status: route.status, text: async () => body };
  });
}

export interface FakePage {
  title: string;
  links: string[];
}

/**
 * Page source backed by a map of URL -> page; URLs not in the map fail with NOT_FOUND
 */
export function createFakeSite(pages: Record<string, FakePage>): PageSource & { fetchPage: jest.Mock<Promise<FetchResult>, [string]> } {
  return {
    fetchPage: jest.fn<Promise<FetchResult>, [string]>(async (url) => {
      const page = pages[url];
      if (!page) {
        return { ok: false, failure: { type: FetchErrorType.NOT_FOUND, message: `No page at ${url}` } };
      }
      return {
        ok: true,
        page: { url, title: page.title, text: '', images: [], links: new Set(page.links) },
      };
    }),
  };
}

/**
 * Silence console output for the duration of a test file
 */
export function silenceConsole(): void {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });
}
