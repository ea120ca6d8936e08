import Table from 'cli-table3';

export function printTable(
  data: Record<string, string | number>[],
  options: Table.TableConstructorOptions & { head: string[] },
): void {
  const table = new Table(options);
  data.forEach((row) => table.push(options.head.map((column) => String(row[column] ?? ''))));
  console.log(table.toString());
}
