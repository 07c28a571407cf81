import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { recordIdFromUrl } from "../reddit/mapping.js";
import type { ExportRecord } from "../reddit/types.js";
import {
	discardStaleTemp,
	isMissingFileError,
	writeFileAtomic,
} from "../utils/atomic-write.js";

export const EXPORT_COLUMNS = [
	"url",
	"title",
	"date",
	"user",
	"n_votes",
	"n_comments",
	"text_op",
	"text_comments",
] as const;

const exportRowSchema = z.object({
	url: z.string(),
	title: z.string(),
	date: z.string(),
	user: z.string(),
	n_votes: z.coerce.number(),
	n_comments: z.coerce.number(),
	text_op: z.string(),
	text_comments: z.string(),
});

export type ExportRow = z.infer<typeof exportRowSchema>;

export function toExportRow(record: ExportRecord): ExportRow {
	return {
		url: record.url,
		title: record.title,
		date: record.date.toISOString(),
		user: record.user,
		n_votes: record.nVotes,
		n_comments: record.nComments,
		text_op: record.textOp,
		text_comments: record.textComments,
	};
}

/**
 * CSV export store keyed by record id. Every append rewrites the whole file
 * through a temp file and a rename, so a crash leaves the previous version.
 */
export class IncrementalExporter {
	readonly outputPath: string;
	private rows: ExportRow[] = [];
	private ids = new Set<string>();

	constructor(outputPath: string) {
		this.outputPath = outputPath;
	}

	get rowCount(): number {
		return this.rows.length;
	}

	/** Returns whether a half-written temp file from an earlier crash was dropped. */
	async load(): Promise<boolean> {
		const discarded = await discardStaleTemp(this.outputPath);

		let raw: string;
		try {
			raw = await readFile(this.outputPath, "utf8");
		} catch (error) {
			if (!isMissingFileError(error)) throw error;
			raw = "";
		}

		const parsed: unknown = raw.trim()
			? parse(raw, { columns: true, bom: true, skip_empty_lines: true })
			: [];
		this.rows = z.array(exportRowSchema).parse(parsed);
		this.ids = new Set(
			this.rows
				.map((row) => recordIdFromUrl(row.url))
				.filter((id): id is string => id !== null),
		);
		return discarded;
	}

	existingIds(): ReadonlySet<string> {
		return this.ids;
	}

	has(id: string): boolean {
		return this.ids.has(id);
	}

	/** Appends records whose id is not stored yet; returns how many were written. */
	async append(records: ExportRecord[]): Promise<number> {
		const fresh: ExportRecord[] = [];
		const batchIds = new Set<string>();
		for (const record of records) {
			if (this.ids.has(record.id) || batchIds.has(record.id)) continue;
			batchIds.add(record.id);
			fresh.push(record);
		}

		if (fresh.length === 0) return 0;

		const nextRows = [...this.rows, ...fresh.map(toExportRow)];
		const content = stringify(nextRows, {
			header: true,
			columns: [...EXPORT_COLUMNS],
		});
		await writeFileAtomic(this.outputPath, content);

		this.rows = nextRows;
		for (const id of batchIds) this.ids.add(id);
		return fresh.length;
	}
}
