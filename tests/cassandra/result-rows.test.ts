/**
 * Tests for adapting driver results to table rows
 * Uses fake result sets shaped like the driver's
 */

import { describeColumns, resultRows, valueKindOf } from '../../src/cassandra/result-rows.js';
import { renderTable } from '../../src/core/table-renderer.js';
import { CQL, fakeResult } from '../mocks/index.js';

describe('valueKindOf', () => {
  it.each([
    ['int', CQL.int],
    ['bigint', CQL.bigint],
    ['smallint', CQL.smallint],
    ['tinyint', CQL.tinyint],
    ['varint', CQL.varint],
    ['counter', CQL.counter],
    ['float', CQL.float],
    ['double', CQL.double],
    ['decimal', CQL.decimal],
  ])('should treat %s as numeric', (_name, code) => {
    expect(valueKindOf(code)).toBe('numeric');
  });

  it.each([
    ['text', CQL.text],
    ['varchar', CQL.varchar],
    ['uuid', CQL.uuid],
    ['timestamp', CQL.timestamp],
    ['set', CQL.set],
    ['map', CQL.map],
    ['boolean', CQL.boolean],
    ['blob', CQL.blob],
  ])('should treat %s as other', (_name, code) => {
    expect(valueKindOf(code)).toBe('other');
  });
});

describe('describeColumns', () => {
  it('should keep the result column order', () => {
    const result = fakeResult(
      [
        ['id', CQL.text],
        ['name', CQL.text],
        ['age', CQL.int],
      ],
      [],
    );

    expect(describeColumns(result.columns)).toEqual([
      { name: 'id', kind: 'other' },
      { name: 'name', kind: 'other' },
      { name: 'age', kind: 'numeric' },
    ]);
  });

  it('should return no columns when the result has no metadata', () => {
    expect(describeColumns(null)).toEqual([]);
  });
});

describe('resultRows', () => {
  it('should render a result set with int columns right-aligned', () => {
    const result = fakeResult(
      [
        ['id', CQL.text],
        ['name', CQL.text],
        ['age', CQL.int],
      ],
      [
        { id: '123', name: 'jon', age: 32 },
        { id: '456', name: 'mary', age: 25 },
      ],
    );

    expect(renderTable(resultRows(result))).toBe(
      [
        '+---+----+---+',
        '|id |name|age|',
        '+---+----+---+',
        '|123|jon | 32|',
        '|456|mary| 25|',
        '+---+----+---+',
      ].join('\n'),
    );
  });

  it('should render null cells and collections', () => {
    const result = fakeResult(
      [
        ['key', CQL.text],
        ['tokens', CQL.set],
      ],
      [{ key: 'local', tokens: null }, { key: 'peer', tokens: ['-1', '7'] }],
    );

    expect(renderTable(resultRows(result)).split('\n').slice(3, 5)).toEqual([
      '|local|null   |',
      '|peer |[-1, 7]|',
    ]);
  });

  it('should render map and blob cells on a single line each', () => {
    const result = fakeResult(
      [
        ['key', CQL.text],
        ['truncated_at', CQL.map],
        ['b', CQL.blob],
      ],
      [{ key: 'local', truncated_at: { a1b2: 1 }, b: Buffer.from([0x41, 0x0a, 0x42]) }],
    );

    expect(renderTable(resultRows(result)).split('\n')).toEqual([
      '+-----+------------+--------+',
      '|key  |truncated_at|b       |',
      '+-----+------------+--------+',
      '|local|{a1b2=1}    |0x410a42|',
      '+-----+------------+--------+',
    ]);
  });

  it('should render maps decoded as Map instances', () => {
    const result = fakeResult(
      [
        ['key', CQL.text],
        ['truncated_at', CQL.map],
      ],
      [{ key: 'local', truncated_at: new Map([['a1b2', Buffer.from([0xff])]]) }],
    );

    expect(renderTable(resultRows(result)).split('\n')[3]).toBe('|local|{a1b2=0xff} |');
  });

  it('should report a missing column as undefined', () => {
    const result = fakeResult([['id', CQL.text]], [{ other: 'x' }]);
    const [row] = resultRows(result);

    expect(row?.text('id')).toBeUndefined();
  });

  it('should share one set of descriptors across rows', () => {
    const result = fakeResult([['n', CQL.double]], [{ n: 1.5 }, { n: 2 }]);
    const [first, second] = resultRows(result);

    expect(first?.columns).toBe(second?.columns);
    expect(first?.columns).toEqual([{ name: 'n', kind: 'numeric' }]);
  });
});
