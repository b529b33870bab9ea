import {
  NO_FILTER,
  actorFilter,
  andFilters,
  dateRangeFilter,
  parseReportPeriod,
  periodFilter,
  whereClause,
} from '../report-filter';

describe('report filters', () => {
  it('parses known periods and treats anything else as All', () => {
    expect(parseReportPeriod('Today')).toBe('Today');
    expect(parseReportPeriod('This Month')).toBe('This Month');
    expect(parseReportPeriod('today')).toBe('All');
    expect(parseReportPeriod(null)).toBe('All');
  });

  it('builds local-time period predicates without parameters', () => {
    expect(periodFilter('Today', 's.created_at')).toEqual({
      clause: "date(s.created_at, 'localtime') = date('now', 'localtime')",
      params: [],
    });
    expect(periodFilter('This Month', 'x')).toEqual({
      clause: "strftime('%Y-%m', x, 'localtime') = strftime('%Y-%m', 'now', 'localtime')",
      params: [],
    });
    expect(periodFilter('All', 'x')).toBe(NO_FILTER);
  });

  it('binds the actor positionally', () => {
    expect(actorFilter("o'brien", 's.created_by')).toEqual({ clause: 's.created_by = ?', params: ["o'brien"] });
    expect(actorFilter(null, 's.created_by')).toBe(NO_FILTER);
    expect(actorFilter(undefined, 's.created_by')).toBe(NO_FILTER);
  });

  it('joins present clauses and keeps parameter order', () => {
    const combined = andFilters(
      dateRangeFilter('2024-01-01', '2024-01-31', 'c'),
      NO_FILTER,
      actorFilter('bob', 'a'),
    );

    expect(combined).toEqual({
      clause: "(date(c, 'localtime') BETWEEN date(?) AND date(?)) AND (a = ?)",
      params: ['2024-01-01', '2024-01-31', 'bob'],
    });
    expect(whereClause(combined)).toBe(`WHERE ${combined.clause}`);
  });

  it('renders no WHERE for an empty filter', () => {
    expect(whereClause(andFilters(NO_FILTER, NO_FILTER))).toBe('');
  });
});
