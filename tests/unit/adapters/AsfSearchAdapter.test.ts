import type { Polygon } from 'geojson';
import { describe, expect, it } from 'vitest';
import { ASF_SEARCH_URL, AsfSearchAdapter } from '../../../src/adapters/asf/AsfSearchAdapter.js';
import { ConfigError, SearchFailure } from '../../../src/types/errors.js';
import type { SceneSearchQuery } from '../../../src/types/scene.js';
import { reply, stubClient } from '../helpers/axiosStub.js';

const polygon: Polygon = {
  type: 'Polygon',
  coordinates: [
    [
      [-74.0, 40.7],
      [-74.0, 40.8],
      [-73.9, 40.8],
      [-73.9, 40.7],
      [-74.0, 40.7],
    ],
  ],
};

const query: SceneSearchQuery = {
  areaOfInterest: polygon,
  start: new Date('2024-06-08T12:00:00.000Z'),
  end: new Date('2024-06-15T12:00:00.000Z'),
  maxResults: 100,
  platform: 'SENTINEL-1',
  productType: 'SLC',
};

const featureCollection = {
  type: 'FeatureCollection',
  features: [
    { type: 'Feature', properties: { sceneName: 'S1A_ONE', startTime: '2024-06-14T05:45:12Z', url: 'https://x.test/1.zip' } },
    { type: 'Feature', properties: { fileName: 'S1A_TWO.zip', startTime: 'not-a-date' } },
  ],
};

describe('AsfSearchAdapter', () => {
  it('queries the search API with the area of interest as WKT', async () => {
    const { client, requests } = stubClient((config) => reply(config, 200, featureCollection));

    await new AsfSearchAdapter({ client }).search(query);

    expect(requests[0].url).toBe(ASF_SEARCH_URL);
    expect(requests[0].params).toEqual({
      platform: 'SENTINEL-1',
      processingLevel: 'SLC',
      intersectsWith: 'POLYGON((-74 40.7, -74 40.8, -73.9 40.8, -73.9 40.7, -74 40.7))',
      start: '2024-06-08T12:00:00.000Z',
      end: '2024-06-15T12:00:00.000Z',
      maxResults: 100,
      output: 'geojson',
    });
  });

  it('normalizes every feature, keeping malformed ones', async () => {
    const { client } = stubClient((config) => reply(config, 200, featureCollection));

    const response = await new AsfSearchAdapter({ client }).search(query);

    expect(response.failure).toBeUndefined();
    expect(response.records.map((r) => [r.granuleName, r.acquisitionTime])).toEqual([
      ['S1A_ONE', '2024-06-14T05:45:12.000Z'],
      ['S1A_TWO', null],
    ]);
    expect(response.records[1].parseErrors).toEqual(['acquisitionTime: could not parse "not-a-date"']);
  });

  it('returns a failure instead of throwing on HTTP errors', async () => {
    const { client, requests } = stubClient((config) => reply(config, 400, { error: 'bad request' }));

    const response = await new AsfSearchAdapter({ client }).search(query);

    expect(response.records).toEqual([]);
    expect(response.failure).toBeInstanceOf(SearchFailure);
    expect(response.failure?.message).toBe('Search failed (asf): Request failed with status code 400');
    expect(requests).toHaveLength(1);
  });

  it('retries transient server errors', async () => {
    let calls = 0;
    const { client } = stubClient((config) => {
      calls++;
      return calls === 1 ? reply(config, 503, 'busy') : reply(config, 200, featureCollection);
    });

    const response = await new AsfSearchAdapter({ client, maxRetries: 1 }).search(query);

    expect(calls).toBe(2);
    expect(response.records).toHaveLength(2);
  });

  it('reports a body that is not a feature collection', async () => {
    const { client } = stubClient((config) => reply(config, 200, '<html>maintenance</html>'));

    const response = await new AsfSearchAdapter({ client }).search(query);

    expect(response.failure?.message).toBe('Search failed (asf): response is not a GeoJSON FeatureCollection');
  });

  it('rejects a polygon with fewer than three vertices before querying', async () => {
    const { client, requests } = stubClient((config) => reply(config, 200, featureCollection));
    const line: Polygon = { type: 'Polygon', coordinates: [[[0, 0], [1, 1]]] };

    await expect(new AsfSearchAdapter({ client }).search({ ...query, areaOfInterest: line })).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(requests).toHaveLength(0);
  });
});
