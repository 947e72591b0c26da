import type { OutputFormat } from '../types.js'

type Cell = string | number | undefined | null

// Long cells (withheld-tool reasons, descriptions) are cut in markdown tables only
const MAX_MARKDOWN_CELL = 60

function truncate(value: string, max: number): string {
	return value.length > max ? `${value.slice(0, max - 1)}…` : value
}

export function formatTable(headers: string[], rows: Cell[][], format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(
			rows.map((row) => {
				const obj: Record<string, string | number | null> = {}
				for (let i = 0; i < headers.length; i++) {
					obj[headers[i]] = row[i] ?? null
				}
				return obj
			}),
			null,
			2,
		)
	}

	if (format === 'plain') {
		const headerLine = headers.join('\t')
		const dataLines = rows.map((row) => row.map((v) => v ?? '').join('\t'))
		return [headerLine, ...dataLines].join('\n')
	}

	const cells = rows.map((row) => row.map((v) => truncate(String(v ?? ''), MAX_MARKDOWN_CELL)))
	const colWidths = headers.map((h, i) =>
		cells.reduce((max, row) => Math.max(max, row[i]?.length ?? 0), h.length),
	)

	const line = (values: string[]) =>
		`| ${values.map((v, i) => v.padEnd(colWidths[i])).join(' | ')} |`
	const separator = `| ${colWidths.map((w) => '-'.repeat(w)).join(' | ')} |`

	return [line(headers), separator, ...cells.map(line)].join('\n')
}

export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	const entries = Object.entries(data).filter(([_, v]) => v != null)

	if (format === 'json') {
		return JSON.stringify(Object.fromEntries(entries), null, 2)
	}

	if (format === 'plain') {
		return entries.map(([k, v]) => `${k}\t${v}`).join('\n')
	}

	const maxKeyLen = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(maxKeyLen)}**: ${v}`).join('\n')
}
