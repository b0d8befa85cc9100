import { describe, it, expect } from 'vitest';
import { decodeTable, parseTable, readRepairedTable, repairHeader } from '../src/pipeline/csv.js';

describe('repairHeader', () => {
  it('leaves an intact header untouched', () => {
    const text = 'user_id,image_id,rating,occasion\nu1,img1,5,party\n';
    expect(repairHeader(text)).toEqual({ strategy: 'intact', text });
  });

  it('rejoins the known split rating fragment', () => {
    const text = 'user_id,image_id,rati\nng,occasion,category\nu1,img1,4,work,top\n';
    const repaired = repairHeader(text);
    expect(repaired.strategy).toBe('literal-rejoin');
    expect(repaired.text).toBe('user_id,image_id,rating,occasion,category\nu1,img1,4,work,top\n');
  });

  it('scans a CRLF header broken mid-word', () => {
    const text = 'user_id,image_id,rat\r\ning,occasion\r\nu1,img1,3,gym\r\n';
    expect(repairHeader(text)).toEqual({
      strategy: 'bounded-scan',
      text: 'user_id,image_id,rating,occasion\nu1,img1,3,gym\r\n',
    });
  });

  it('gives up after five lines and keeps the original text', () => {
    const text = 'user_id\n,image_id\n,rat\ni\nng\n,occasion\nu1,img1,3,gym\n';
    expect(repairHeader(text)).toEqual({ strategy: 'unrepaired', text });
  });

  it('reports unrepaired when the markers never appear', () => {
    const text = 'name,value\nfoo,1\n';
    expect(repairHeader(text)).toEqual({ strategy: 'unrepaired', text });
  });

  it('accepts custom markers', () => {
    expect(repairHeader('a,b\n1,2\n', ['a', 'b']).strategy).toBe('intact');
  });
});

describe('parseTable', () => {
  it('trims values, pads short rows and drops blank or overlong rows', () => {
    const text = [
      'user_id, image_id ,rating,occasion',
      ' u1 , img1 ,5,party',
      ',,,',
      'u2,img2',
      'u3,img3,4,work,extra',
      '',
    ].join('\n');

    const table = parseTable(text);
    expect(table.header).toEqual(['user_id', 'image_id', 'rating', 'occasion']);
    expect(table.rows).toEqual([
      { user_id: 'u1', image_id: 'img1', rating: '5', occasion: 'party' },
      { user_id: 'u2', image_id: 'img2', rating: '', occasion: '' },
    ]);
    expect(table.dropped).toBe(2);
  });

  it('returns an empty table for empty text', () => {
    expect(parseTable('  \n')).toEqual({ header: [], rows: [], dropped: 0 });
  });
});

describe('decodeTable', () => {
  it('substitutes the replacement character for invalid bytes', () => {
    expect(decodeTable(new Uint8Array([0x61, 0xff, 0x62]))).toBe('a\uFFFDb');
  });
});

describe('readRepairedTable', () => {
  it('parses rows under the repaired header', () => {
    const raw = Buffer.from('user_id,image_id,rati\nng,occasion\nu1,img1,5,party\n');
    const table = readRepairedTable(raw);
    expect(table.repair).toBe('literal-rejoin');
    expect(table.rows).toEqual([{ user_id: 'u1', image_id: 'img1', rating: '5', occasion: 'party' }]);
  });
});
