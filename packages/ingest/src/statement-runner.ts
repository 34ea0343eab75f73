import type { TableStore } from "@loadstone/adapter";
import { type Diagnostics, isValidTableName } from "@loadstone/core";

const INSERT_TARGET_RE = /INSERT\s+INTO\s+([^\s(]+)/i;

/** Table named by the first `INSERT INTO`, if it is a plain table reference. */
export function extractInsertTable(sql: string): string | undefined {
	const target = INSERT_TARGET_RE.exec(sql)?.[1];
	return target !== undefined && isValidTableName(target) ? target : undefined;
}

export interface StatementIngestionPlan {
	createTableSql?: string;
	/** Statement that pulls the data server-side (e.g. `INSERT INTO t SELECT * FROM url(...)`) */
	insertSql: string;
	optimizeSql?: string;
	skipTableCreation?: boolean;
}

/**
 * Ingest with statements the store runs itself: create, insert, then
 * optionally optimize. Row counts around the insert are logged when the
 * insert names its target table.
 */
export async function runStatementIngestion(
	store: TableStore,
	plan: StatementIngestionPlan,
	diagnostics: Diagnostics,
): Promise<boolean> {
	if (plan.createTableSql !== undefined && !plan.skipTableCreation) {
		diagnostics.info("Creating table");
		const created = await store.execute(plan.createTableSql);
		if (!created.ok) {
			diagnostics.error(`Table creation failed: ${created.error.message}`);
			return false;
		}
	} else {
		diagnostics.info("Skipping table creation");
	}

	const table = extractInsertTable(plan.insertSql);
	let countBefore: number | undefined;
	if (table !== undefined) {
		const counted = await store.countRows(table);
		if (counted.ok) {
			countBefore = counted.value;
			diagnostics.info(`Row count before insert in ${table}: ${countBefore}`);
		} else {
			diagnostics.warn(`Could not count rows in ${table}`, { error: counted.error.message });
		}
	}

	diagnostics.info("Inserting data");
	const inserted = await store.execute(plan.insertSql);
	if (!inserted.ok) {
		diagnostics.error(`Insert failed: ${inserted.error.message}`);
		return false;
	}

	if (table !== undefined && countBefore !== undefined) {
		const counted = await store.countRows(table);
		if (counted.ok) {
			diagnostics.info(`Row count after insert in ${table}: ${counted.value}`, {
				rowsAdded: counted.value - countBefore,
			});
		} else {
			diagnostics.warn(`Could not count rows in ${table}`, { error: counted.error.message });
		}
	}

	if (plan.optimizeSql !== undefined) {
		diagnostics.info("Optimizing table");
		const optimized = await store.execute(plan.optimizeSql);
		if (!optimized.ok) {
			diagnostics.warn(`Optimization failed: ${optimized.error.message}`);
		}
	}

	diagnostics.info("Statement ingestion completed");
	return true;
}

export interface NamedStatement {
	/** File name or label shown in logs */
	name: string;
	sql: string;
}

/** Run statements in order, stopping at the first failure. */
export async function runQueries(
	store: TableStore,
	statements: readonly NamedStatement[],
	diagnostics: Diagnostics,
): Promise<boolean> {
	for (const statement of statements) {
		diagnostics.info(`Executing ${statement.name}`);
		const result = await store.execute(statement.sql);
		if (!result.ok) {
			diagnostics.error(`Query ${statement.name} failed: ${result.error.message}`, {
				statement: statement.sql,
			});
			return false;
		}
	}
	diagnostics.info(`Executed ${statements.length} queries`);
	return true;
}
