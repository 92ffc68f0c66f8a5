import { vi } from 'vitest';

export const MARS_PAGE_HTML = [
  '<div class="mw-parser-output"><div class="shortdescription">Fourth planet from the Sun</div>',
  '<table class="infobox" style="width:22em"><tbody>',
  '<tr><th colspan="2" class="infobox-above">Mars</th></tr>',
  '<tr><th scope="row" class="infobox-label">Mean radius</th><td class="infobox-data">3389.5&#160;km</td></tr>',
  '<tr><th scope="row" class="infobox-label">Polar radius</th><td class="infobox-data"><style>.ref{color:red}</style>3376.2&nbsp;km</td></tr>',
  '<tr><td colspan="2"><table class="wikitable"><tr><td>Moons</td><td>2</td></tr></table></td></tr>',
  '</tbody></table>',
  '<p>Mars is the fourth planet from the Sun.</p></div>',
].join('\n');

export const ADA_PAGE_HTML = [
  '<div class="mw-parser-output">',
  '<table class="infobox biography vcard"><tbody>',
  '<tr><th class="infobox-label">Born</th><td class="infobox-data">Augusta Ada Byron<br />',
  '<span style="display:none">(<span class="bday">1815-12-10</span>)</span>10 December 1815<br />London, England</td></tr>',
  '<tr><th class="infobox-label">Died</th><td class="infobox-data">27 November 1852 (aged&#160;36)</td></tr>',
  '</tbody></table>',
  '</div>',
].join('\n');

export const AIRPORT_PAGE_HTML = [
  '<div class="mw-parser-output">',
  '<table class="infobox"><tbody>',
  '<tr><th class="infobox-label">Elevation&#160;AMSL</th><td class="infobox-data">83&#160;ft / 25&#160;m</td></tr>',
  '<tr><td colspan="2"><table class="wikitable"><tbody>',
  '<tr><th>Direction</th><th>Length ft</th><th>m</th><th>Surface</th></tr>',
  '<tr><td>4L/22R</td><td>12,001</td><td>3,658</td><td>Asphalt</td></tr>',
  '<tr><td>9/27</td><td>7,000</td><td>2,134</td><td>Asphalt</td></tr>',
  '</tbody></table></td></tr>',
  '</tbody></table>',
  '</div>',
].join('\n');

export const NO_INFOBOX_HTML = '<div class="mw-parser-output"><p>A short stub article.</p></div>';

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

/**
 * Fake MediaWiki endpoint: search hits are exact (case-insensitive) title
 * matches against `pages`, parse returns the stored HTML.
 */
export function createWikipediaFetch(pages: Record<string, string>) {
  const titles = Object.keys(pages);

  return vi.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    const params = new URL(url).searchParams;

    if (params.get('action') === 'query') {
      const term = (params.get('srsearch') ?? '').toLowerCase();
      const hits = titles.filter((title) => title.toLowerCase() === term).map((title) => ({ title }));
      return jsonResponse({ batchcomplete: true, query: { search: hits } });
    }

    const page = params.get('page') ?? '';
    const html = pages[page];
    if (html === undefined) {
      return jsonResponse({ error: { code: 'missingtitle', info: "The page you specified doesn't exist." } });
    }
    return jsonResponse({ parse: { title: page, pageid: 1, text: html } });
  });
}
