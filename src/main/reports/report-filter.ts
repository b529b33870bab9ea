import { REPORT_PERIODS, type ReportPeriod } from '../../shared/reports';

export type SqlParam = string | number | null;

/** A predicate and the values bound to its `?` placeholders, in order. */
export interface SqlFilter {
  clause: string;
  params: SqlParam[];
}

export const NO_FILTER: SqlFilter = { clause: '', params: [] };

export function parseReportPeriod(value: string | null | undefined): ReportPeriod {
  return REPORT_PERIODS.find((period) => period === value) ?? 'All';
}

export function periodFilter(period: ReportPeriod, column: string): SqlFilter {
  switch (period) {
    case 'Today':
      return { clause: `date(${column}, 'localtime') = date('now', 'localtime')`, params: [] };
    case 'This Month':
      return {
        clause: `strftime('%Y-%m', ${column}, 'localtime') = strftime('%Y-%m', 'now', 'localtime')`,
        params: [],
      };
    case 'All':
      return NO_FILTER;
  }
}

export function actorFilter(createdBy: string | null | undefined, column: string): SqlFilter {
  if (createdBy === null || createdBy === undefined) return NO_FILTER;
  return { clause: `${column} = ?`, params: [createdBy] };
}

export function dateRangeFilter(start: string, end: string, column: string): SqlFilter {
  return {
    clause: `date(${column}, 'localtime') BETWEEN date(?) AND date(?)`,
    params: [start, end],
  };
}

export function andFilters(...filters: SqlFilter[]): SqlFilter {
  const present = filters.filter((filter) => filter.clause);
  return {
    clause: present.map((filter) => `(${filter.clause})`).join(' AND '),
    params: present.flatMap((filter) => filter.params),
  };
}

export function whereClause(filter: SqlFilter): string {
  return filter.clause ? `WHERE ${filter.clause}` : '';
}
