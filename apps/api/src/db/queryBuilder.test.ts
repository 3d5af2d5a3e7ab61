import { describe, it, expect } from 'vitest';
import { FilterBuilder, escapeLike, filter, update } from './queryBuilder.js';

describe('FilterBuilder', () => {
  it('should return an empty clause without conditions', () => {
    expect(new FilterBuilder().build()).toEqual({ whereClause: '', params: [] });
  });

  it('should join conditions with AND in call order', () => {
    const result = filter()
      .equals('server_is_active', 1)
      .like('name', '%web%')
      .build();

    expect(result).toEqual({
      whereClause: "WHERE server_is_active = ? AND name LIKE ? ESCAPE '\\'",
      params: [1, '%web%'],
    });
  });

  it('should skip undefined values and empty patterns', () => {
    const result = filter()
      .equals('ip_address', undefined)
      .like('name', undefined)
      .like('description', '')
      .equals('id', 7)
      .build();

    expect(result).toEqual({ whereClause: 'WHERE id = ?', params: [7] });
  });

  it('should keep null as a bound value', () => {
    expect(filter().equals('description', null).build().params).toEqual([null]);
  });
});

describe('escapeLike', () => {
  it('should escape wildcards and the escape character', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('should leave plain text alone', () => {
    expect(escapeLike('web-1')).toBe('web-1');
  });
});

describe('UpdateBuilder', () => {
  it('should build a SET clause from defined values', () => {
    const result = update()
      .set('name', 'renamed')
      .set('ip_address', undefined)
      .setRaw('updated_at', 'CURRENT_TIMESTAMP')
      .build();

    expect(result).toEqual({
      setClause: 'name = ?, updated_at = CURRENT_TIMESTAMP',
      params: ['renamed'],
    });
  });

  it('should report no updates when every value is undefined', () => {
    const builder = update().set('name', undefined).set('description', undefined);

    expect(builder.hasUpdates).toBe(false);
    expect(builder.build()).toEqual({ setClause: '', params: [] });
  });

  it('should report updates once a bound value is set', () => {
    expect(update().set('server_is_active', 0).hasUpdates).toBe(true);
  });
});
