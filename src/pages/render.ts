import { readFileSync } from "node:fs";

export type PageName = "dashboard" | "setup";

const templates = new Map<PageName, string>();

function template(name: PageName) {
	let html = templates.get(name);
	if (html == null) {
		html = readFileSync(new URL(`./${name}.html`, import.meta.url), "utf-8");
		templates.set(name, html);
	}
	return html;
}

export function escapeHtml(text: string) {
	return text
		.replaceAll("&", "&amp;")
		.replaceAll("<", "&lt;")
		.replaceAll(">", "&gt;")
		.replaceAll('"', "&quot;")
		.replaceAll("'", "&#39;");
}

/** Fills `{{key}}` placeholders with HTML-escaped values. */
export function renderPage(name: PageName, values: Record<string, string>) {
	return template(name).replace(/\{\{(\w+)\}\}/g, (_, key: string) =>
		escapeHtml(values[key] ?? ""),
	);
}
