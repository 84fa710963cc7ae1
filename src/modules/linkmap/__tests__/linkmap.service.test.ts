/**
 * Linkmap Service Tests
 */

import { LinkmapService } from '../linkmap.service';
import { createFakeTransport, silenceConsole } from '../../../__tests__/helpers/mocks';

const PAGE = 'https://example.com/';
const LOCAL_LINK = 'file:///etc/linkmap-absent.html';
const GONE = 'https://example.com/gone';

describe('LinkmapService', () => {
  silenceConsole();

  const transport = createFakeTransport({
    get: {
      [PAGE]: { status: 200, body: `<a href="${LOCAL_LINK}">Local</a><a href="/gone">Gone</a>` },
    },
    head: {
      [PAGE]: { status: 200 },
      [GONE]: { status: 404 },
    },
  });

  beforeEach(() => {
    transport.mockClear();
  });

  it('should not report local files linked from a page when local files are not allowed', async () => {
    const service = new LinkmapService({ transport, errorStatusCodes: [404], allowLocalFiles: false });

    const records = await service.scanBrokenLinks([PAGE]);

    expect(records).toEqual([{ parentUrl: PAGE, brokenLink: GONE, status: 404, error: 'Status 404' }]);
  });

  it('should report missing local files when local files are allowed', async () => {
    const service = new LinkmapService({ transport, errorStatusCodes: [404], allowLocalFiles: true });

    const records = await service.scanBrokenLinks([PAGE]);

    expect(records).toHaveLength(2);
    expect(records).toContainEqual({ parentUrl: PAGE, brokenLink: LOCAL_LINK, status: 404, error: 'Status 404' });
  });

  it('should crawl a tree through the same transport', async () => {
    const service = new LinkmapService({ transport });

    const { tree } = await service.crawlTree(PAGE, 0);

    expect(tree).toEqual({ url: PAGE, title: '', links: [LOCAL_LINK, GONE], children: [] });
  });
});
