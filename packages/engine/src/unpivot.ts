import type { ColumnMeta, Row, Table } from '@querydiff/core'

const FIELD: ColumnMeta = { label: '_field', type: 'string' }

/**
 * Turns a wide table (one column per field, as legacy JSON series are) into
 * one long table per field with `_field` and `_value` columns. Rows whose
 * field value is null are left out.
 */
export function unpivot(table: Table): Table[] {
  const keyLabels = new Set(table.key.columns.map((c) => c.label))
  const time = table.columns.findIndex((c) => c.label === '_time')

  return table.columns.flatMap((field, index): Table[] => {
    if (index === time || keyLabels.has(field.label)) return []
    const columns: ColumnMeta[] = [
      ...(time < 0 ? [] : [{ label: '_time', type: 'dateTime' as const }]),
      { label: '_value', type: field.type },
      FIELD,
      ...table.key.columns,
    ]
    const rows = table.rows.flatMap((row): Row[] => {
      const value = row[index] ?? null
      if (value === null) return []
      return [[...(time < 0 ? [] : [row[time] ?? null]), value, field.label, ...table.key.values]]
    })
    return [
      {
        key: { columns: [...table.key.columns, FIELD], values: [...table.key.values, field.label] },
        columns,
        rows,
      },
    ]
  })
}
