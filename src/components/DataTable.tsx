import type { ReactNode } from 'react';
import './styles.css';

export type ColumnDef<T> = {
  key: keyof T;
  label: string;
  render?: (row: T) => ReactNode;
  cellClass?: (row: T) => string;
};

interface DataTableProps<T> {
  title?: string;
  rows: readonly T[];
  columns: ColumnDef<T>[];
  rowKey: (row: T, index: number) => string;
}

/** Row key that stays unique when the picked field repeats. */
export const keyWithIndex =
  <T,>(pick: (row: T) => string) =>
  (row: T, index: number) =>
    `${pick(row)}-${index}`;

function display(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  if (typeof value === 'number') return value.toLocaleString('en-US');
  return String(value);
}

export function DataTable<T>({ title, rows, columns, rowKey }: DataTableProps<T>) {
  return (
    <div className="card">
      {title && (
        <div className="section-header">
          <h3>{title}</h3>
        </div>
      )}

      <div className="table-wrap">
        <table>
          <thead>
            <tr>
              {columns.map((c) => (
                <th key={String(c.key)}>{c.label}</th>
              ))}
            </tr>
          </thead>

          <tbody>
            {rows.map((r, i) => (
              <tr key={rowKey(r, i)}>
                {columns.map((c) => (
                  <td key={String(c.key)} className={c.cellClass?.(r)}>
                    {c.render ? c.render(r) : display(r[c.key])}
                  </td>
                ))}
              </tr>
            ))}

            {rows.length === 0 && (
              <tr>
                <td colSpan={columns.length} className="small">
                  No rows.
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
    </div>
  );
}
