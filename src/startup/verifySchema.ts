import { executeRawQuery } from "../lib/db";

type Requirement = {
  table: string;
  columns: string[];
};

const requirements: Requirement[] = [
  { table: "progress_kv", columns: ["owner_id", "key", "value", "updated_at"] }
];

export async function verifyDatabaseSchema(): Promise<void> {
  for (const req of requirements) {
    const columns = await executeRawQuery<{ column_name: string }>(
      `SELECT column_name
       FROM information_schema.columns
       WHERE table_schema = 'public'
         AND table_name = $1`,
      [req.table]
    );

    if (columns.length === 0) {
      throw new Error(`Missing table: ${req.table}`);
    }

    const columnSet = new Set(columns.map((c) => c.column_name));
    for (const c of req.columns) {
      if (!columnSet.has(c)) {
        throw new Error(`Missing column ${req.table}.${c}`);
      }
    }
  }
}
