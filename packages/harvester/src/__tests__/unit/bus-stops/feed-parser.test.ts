/**
 * Bus-stop feed parser tests
 */

import { describe, it, expect } from 'vitest';
import { parseBusStopXml } from '../../../bus-stops/feed-parser.js';

const FEED = `<?xml version="1.0" encoding="UTF-8"?>
<busstops>
  <busstop name="01012" wab="true">
    <details>Test Hotel</details>
    <coordinates><long>103.8523</long><lat>1.2967</lat></coordinates>
  </busstop>
  <busstop name="01013" wab="false">
    <details>Sample Church &amp; Hall</details>
    <coordinates><long>103.8525</long><lat>1.2978</lat></coordinates>
  </busstop>
  <busstop name="01019">
    <details>No Access Flag</details>
    <coordinates><long>103.85</long><lat>1.29</lat></coordinates>
  </busstop>
</busstops>`;

describe('parseBusStopXml', () => {
  it('reads attributes, details and coordinates', () => {
    const { stops, skipped } = parseBusStopXml(FEED);

    expect(skipped).toBe(0);
    expect(stops).toEqual([
      { name: '01012', wab: true, details: 'Test Hotel', latitude: 1.2967, longitude: 103.8523 },
      {
        name: '01013',
        wab: false,
        details: 'Sample Church & Hall',
        latitude: 1.2978,
        longitude: 103.8525,
      },
      { name: '01019', wab: false, details: 'No Access Flag', latitude: 1.29, longitude: 103.85 },
    ]);
  });

  it('skips entries whose coordinates are not numeric', () => {
    const { stops, skipped } = parseBusStopXml(`<busstops>
      <busstop name="A"><details>ok</details><coordinates><long>103.1</long><lat>1.1</lat></coordinates></busstop>
      <busstop name="B"><details>bad</details><coordinates><long>n/a</long><lat>1.2</lat></coordinates></busstop>
      <busstop name="C"><details>missing</details></busstop>
    </busstops>`);

    expect(stops.map((stop) => stop.name)).toEqual(['A']);
    expect(skipped).toBe(2);
  });

  it('returns nothing for a feed without stops', () => {
    expect(parseBusStopXml('<busstops/>')).toEqual({ stops: [], skipped: 0 });
  });
});
