import { describe, it, expect } from 'vitest';
import { QTable } from './qTable.ts';

const KEY = '0-:0:up:0000';

describe('QTable (unit)', () => {
  it('reads unseen pairs as 0', () => {
    const table = new QTable();
    expect(table.get(KEY, 'left')).toBe(0);
    expect(table.values(KEY)).toEqual({ left: 0, right: 0, up: 0, down: 0 });
    expect(table.has(KEY)).toBe(false);
    expect(table.size).toBe(0);
  });

  it('stores values per signature and direction', () => {
    const table = new QTable();
    table.set(KEY, 'up', 1.5);
    expect(table.get(KEY, 'up')).toBe(1.5);
    expect(table.get(KEY, 'down')).toBe(0);
    expect(table.size).toBe(1);
  });

  it('takes the max over the given actions only', () => {
    const table = new QTable();
    table.set(KEY, 'left', 9);
    table.set(KEY, 'up', -2);
    expect(table.maxValue(KEY, ['up', 'down'])).toBe(0);
    expect(table.maxValue(KEY, ['up'])).toBe(-2);
    expect(table.maxValue(KEY, [])).toBe(0);
  });

  it('breaks ties by priority order whatever the input order', () => {
    const table = new QTable();
    expect(table.bestAction(KEY, ['right', 'left'])).toBe('left');
    table.set(KEY, 'right', 0.1);
    expect(table.bestAction(KEY, ['right', 'left'])).toBe('right');
    expect(table.bestAction(KEY, [])).toBeNull();
  });

  it('serializes every direction with sorted keys', () => {
    const table = new QTable();
    table.set('0-:0:up:0000', 'up', 2);
    table.set('++:1:down:1000', 'left', -1);
    const json = table.toJSON();
    expect(Object.keys(json)).toEqual(['++:1:down:1000', '0-:0:up:0000']);
    expect(json['0-:0:up:0000']).toEqual({ left: 0, right: 0, up: 2, down: 0 });
  });

  it('drops malformed rows and fills missing directions with 0', () => {
    const result = QTable.fromJSON({
      '0-:0:up:0000': { left: 1 },
      'not-a-key': { left: 1 },
      '++:1:down:0000': { left: 'x' },
      '+0:2:left:1000': { north: 1 },
      '-0:3:right:0110': [1, 2]
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.dropped).toBe(4);
    expect(result.table.size).toBe(1);
    expect(result.table.values('0-:0:up:0000')).toEqual({ left: 1, right: 0, up: 0, down: 0 });
  });

  it('drops keys that parse but are not written the canonical way', () => {
    const result = QTable.fromJSON({
      '0-:007:up:0000': { up: 5 },
      '0-:7:up:0000': { up: 2 }
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.dropped).toBe(1);
    expect(result.table.size).toBe(1);
    expect(result.table.has('0-:007:up:0000')).toBe(false);
    expect(result.table.get('0-:7:up:0000', 'up')).toBe(2);
  });

  it('rejects a document that is not an object', () => {
    expect(QTable.fromJSON([1, 2])).toEqual({ ok: false, reason: 'q-table document must be an object' });
    expect(QTable.fromJSON(null).ok).toBe(false);
  });
});
