/**
 * Bus-stop XML feed parser
 *
 * Feed shape:
 * ```xml
 * <busstops>
 *   <busstop name="01012" wab="true">
 *     <details>Hotel Grand Pacific</details>
 *     <coordinates><long>103.85</long><lat>1.29</lat></coordinates>
 *   </busstop>
 * </busstops>
 * ```
 */

import * as cheerio from 'cheerio';
import { toNumeric } from '../export/geo-table.js';
import type { BusStop, BusStopParseResult } from './types.js';

export function parseBusStopXml(xml: string): BusStopParseResult {
  const $ = cheerio.load(xml, { xml: true });
  const stops: BusStop[] = [];
  let skipped = 0;

  $('busstop').each((_, element) => {
    const entry = $(element);
    const latitude = toNumeric(entry.find('coordinates > lat').first().text());
    const longitude = toNumeric(entry.find('coordinates > long').first().text());

    if (latitude === null || longitude === null) {
      skipped++;
      return;
    }

    stops.push({
      name: entry.attr('name') ?? '',
      wab: entry.attr('wab') === 'true',
      details: entry.children('details').first().text(),
      latitude,
      longitude,
    });
  });

  return { stops, skipped };
}
