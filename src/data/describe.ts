import type { Dataset, DatasetColumn } from '../types';

const TOP_VALUES = 3;

function countValues<T>(values: T[], key: (value: T) => string): Map<string, { value: T; count: number }> {
  const counts = new Map<string, { value: T; count: number }>();
  for (const value of values) {
    const id = key(value);
    const entry = counts.get(id);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(id, { value, count: 1 });
    }
  }
  return counts;
}

/**
 * One description line for a column, or null when the column holds no values.
 */
export function describeColumn(column: DatasetColumn): string | null {
  switch (column.kind) {
    case 'numeric': {
      const values = column.values.filter((value): value is number => value !== null);
      if (values.length === 0) return null;
      const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
      const min = values.reduce((low, value) => Math.min(low, value));
      const max = values.reduce((high, value) => Math.max(high, value));
      return `numeric. mean: ${mean.toFixed(2)} min: ${min.toFixed(2)} max: ${max.toFixed(2)}`;
    }
    case 'textual': {
      const values = column.values.filter((value): value is string => value !== null);
      if (values.length === 0) return null;
      const counts = countValues(values, (value) => value);
      // sort is stable, so ties keep first-appearance order
      const examples = [...counts.values()]
        .sort((a, b) => b.count - a.count)
        .slice(0, TOP_VALUES)
        .map(({ value, count }) => `${value} (${count})`)
        .join(', ');
      return `string. ${counts.size} unique values. E.g. ${examples}`;
    }
    case 'temporal': {
      const times = column.values.filter((value): value is Date => value !== null).map((value) => value.getTime());
      if (times.length === 0) return null;
      const min = new Date(times.reduce((low, value) => Math.min(low, value))).toISOString();
      const max = new Date(times.reduce((high, value) => Math.max(high, value))).toISOString();
      return `date. min: ${min} max: ${max}`;
    }
    case 'mixed': {
      const values = column.values.filter((value): value is number | string => value !== null);
      if (values.length === 0) return null;
      const counts = countValues(values, (value) => `${typeof value}:${value}`);
      return `mixed type with ${counts.size} unique values`;
    }
  }
}

/**
 * Text shown to the caller and sent to the completion service as dataset context.
 */
export function describeDataset(dataset: Dataset): string {
  const lines = dataset.columns.flatMap((column) => {
    const description = describeColumn(column);
    return description === null ? [] : [`- ${column.name}: ${description}`];
  });
  return `The dataset df has ${dataset.rowCount} rows and ${dataset.columns.length} columns:\n` + lines.join('\n');
}
