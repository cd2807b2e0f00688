import { html, raw } from "hono/html"

import type { SignalView } from "./view.ts"

import { formatAge } from "./view.ts"

export interface SignalViewJson {
	id: string
	title: string
	status: string
	value: string
	/** ISO 8601 */
	ts: string
	ageSeconds: number
	age: string
	details: string | null
	link: string | null
}

export interface SignalListJson {
	count: number
	signals: SignalViewJson[]
}

export function toJson(view: SignalView): SignalViewJson {
	return {
		id: view.id,
		title: view.title,
		status: view.status,
		value: view.value,
		ts: view.ts.toISOString(),
		ageSeconds: view.ageSeconds,
		age: formatAge(view.ageSeconds),
		details: view.details,
		link: view.link,
	}
}

export function renderJson(views: readonly SignalView[]): SignalListJson {
	return { count: views.length, signals: views.map(toJson) }
}

/**
 * One line per signal: `STATUS  ID  AGE  VALUE`, in fixed-width columns.
 * IDs longer than the column are cut.
 */
export function renderText(views: readonly SignalView[]): string {
	const lines = views.map((view) => {
		const status = view.status.toUpperCase().padEnd(7)
		const id = view.id.padEnd(18).slice(0, 18)
		const age = formatAge(view.ageSeconds).padStart(4)
		return `${status} ${id} ${age}  ${view.value}`
	})
	return `${lines.join("\n")}\n`
}

export interface HtmlPage {
	heading: string
	views: readonly SignalView[]
}

const STYLE = `
body { font-family: system-ui, sans-serif; margin: 24px; max-width: 900px; background: #111; color: #eee; }
ul.signals { list-style: none; padding: 0; }
li.signal { display: grid; grid-template-columns: 5em 1fr auto 3em; gap: 12px; padding: 8px 0; border-bottom: 1px solid #333; }
.status { font-weight: 600; }
.status-ok .status { color: #4caf50; }
.status-warn .status { color: #ffb300; }
.status-bad .status { color: #ef5350; }
.status-unknown .status { color: #9e9e9e; }
.age { color: #9e9e9e; text-align: right; }
.details { grid-column: 2 / -1; margin: 0; color: #bbb; font-size: 0.9em; }
a { color: inherit; }
`

export function renderHtml({ heading, views }: HtmlPage) {
	return html`<!doctype html>
<html lang="en">
	<head>
		<meta charset="utf-8" />
		<meta name="viewport" content="width=device-width, initial-scale=1" />
		<meta http-equiv="refresh" content="30" />
		<title>${heading}</title>
		<style>
			${raw(STYLE)}
		</style>
	</head>
	<body>
		<h1>${heading}</h1>
		${views.length === 0
			? html`<p class="empty">No signals.</p>`
			: html`<ul class="signals">
					${views.map(renderSignal)}
				</ul>`}
	</body>
</html>`
}

function renderSignal(view: SignalView) {
	return html`<li class="signal status-${view.status}">
		<span class="status">${view.status.toUpperCase()}</span>
		<span class="title">${view.link ? html`<a href="${view.link}">${view.title}</a>` : view.title}</span>
		<span class="value">${view.value}</span>
		<span class="age" title="${view.ts.toISOString()}">${formatAge(view.ageSeconds)}</span>
		${view.details ? html`<p class="details">${view.details}</p>` : ""}
	</li>`
}
