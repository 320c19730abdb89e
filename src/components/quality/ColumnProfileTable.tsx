import type { ColumnProfile } from "../../lib/profiling/profileDataset";

type ColumnProfileTableProps = {
  columns: ColumnProfile[];
};

const formatStat = (value: number | null | undefined): string =>
  value === null || value === undefined ? "-" : Number(value.toFixed(3)).toString();

const formatPercent = (value: number): string => `${(value * 100).toFixed(1)}%`;

export const ColumnProfileTable = ({ columns }: ColumnProfileTableProps) => {
  if (columns.length === 0) {
    return <p className="meta">No columns to profile.</p>;
  }

  return (
    <div className="table-scroll">
      <table className="profile-table">
        <thead>
          <tr>
            <th>Column</th>
            <th>Type</th>
            <th>Complete</th>
            <th>Missing</th>
            <th>Unique</th>
            <th>Mean</th>
            <th>Std dev</th>
            <th>Min</th>
            <th>Max</th>
            <th>Shape</th>
          </tr>
        </thead>
        <tbody>
          {columns.map((column) => (
            <tr key={column.name} className={column.insufficientData ? "row-muted" : undefined}>
              <td>{column.name}</td>
              <td>
                {column.type}
                {column.declaredType && <span className="tag">declared</span>}
              </td>
              <td>{formatPercent(column.completeness)}</td>
              <td>{column.missing}</td>
              <td>{column.uniqueCount}</td>
              <td>{formatStat(column.numeric?.mean)}</td>
              <td>{column.numeric ? formatStat(column.numeric.stdDev) : "-"}</td>
              <td>{formatStat(column.numeric?.min)}</td>
              <td>{formatStat(column.numeric?.max)}</td>
              <td>{column.numeric?.shape ?? "-"}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
};
