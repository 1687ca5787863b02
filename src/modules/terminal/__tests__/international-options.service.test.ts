/**
 * International Options Tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { InternationalOptionsService, parseInternationalOptions } from '../international-options.service';

describe('parseInternationalOptions', () => {
  it('should return sorted distinct commodities and ports', () => {
    const csv = 'commodity,port,price\r\nWheat,Kandla,250\r\n"Rice",Mumbai Port,400\r\nWheat,Novorossiysk,230\r\n\r\n';

    expect(parseInternationalOptions(csv)).toEqual({
      commodities: ['Rice', 'Wheat'],
      ports: ['Kandla', 'Mumbai Port', 'Novorossiysk'],
    });
  });

  it('should keep commas inside quoted fields', () => {
    const csv = 'commodity,port\n"Rice, Basmati",Kandla\nWheat,"Port Louis, MU"\n';

    expect(parseInternationalOptions(csv)).toEqual({
      commodities: ['Rice, Basmati', 'Wheat'],
      ports: ['Kandla', 'Port Louis, MU'],
    });
  });

  it('should ignore a header-only file', () => {
    expect(parseInternationalOptions('commodity,port\n')).toEqual({ commodities: [], ports: [] });
  });
});

describe('InternationalOptionsService', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'intl-options-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should read options from the CSV file', async () => {
    const csvPath = path.join(dir, 'prices.csv');
    await fs.writeFile(csvPath, 'commodity,port\nMaize,Santos\nMaize,Kandla\n');

    await expect(new InternationalOptionsService({ csvPath }).produceSnapshot()).resolves.toEqual({
      commodities: ['Maize'],
      ports: ['Kandla', 'Santos'],
      source: 'live',
    });
  });

  it('should fall back to defaults when the file is missing', async () => {
    const service = new InternationalOptionsService({ csvPath: path.join(dir, 'missing.csv') });

    await expect(service.produceSnapshot()).resolves.toEqual({
      commodities: ['Wheat', 'Rice', 'Maize', 'Soybean'],
      ports: ['Mumbai Port', 'Kandla', 'Chennai', 'Novorossiysk'],
      source: 'fallback',
    });
  });

  it('should fall back when the file has no rows', async () => {
    const csvPath = path.join(dir, 'empty.csv');
    await fs.writeFile(csvPath, 'commodity,port\n');

    const snapshot = await new InternationalOptionsService({ csvPath }).produceSnapshot();

    expect(snapshot.source).toBe('fallback');
  });
});
