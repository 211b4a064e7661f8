import { RECORD_COLUMNS, TaxpayerRecord } from "../types/taxpayerRecord";
import { WrittenOutputs } from "../output/writeOutputs";

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function page(title: string, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>"
  ].join("\n");
}

export function renderIndex(flash: string | null, demoMode: boolean): string {
  const notice = flash ? `<p class="flash error" role="alert">${escapeHtml(flash)}</p>` : "";
  const mode = demoMode ? '<p class="mode">Demo mode: records come from the sample table.</p>' : "";
  return page(
    "GSTIN Lookup",
    [
      "<h1>GSTIN Lookup</h1>",
      mode,
      notice,
      '<form method="post" action="/scrape">',
      '<label for="gstin">GSTIN</label>',
      '<input id="gstin" name="gstin" maxlength="15" required>',
      '<button type="submit">Search</button>',
      "</form>"
    ]
      .filter(Boolean)
      .join("\n")
  );
}

function cell(value: TaxpayerRecord[keyof TaxpayerRecord]): string {
  if (typeof value === "string") return escapeHtml(value);
  const rows: object[] = value;
  if (!rows.length) return "&mdash;";
  const items = rows.map((row) => `<li>${escapeHtml(Object.values(row).join(" | "))}</li>`);
  return `<ul>${items.join("")}</ul>`;
}

export function renderResult(record: TaxpayerRecord, outputs: WrittenOutputs): string {
  const rows = RECORD_COLUMNS.map(
    (column) => `<tr><th>${escapeHtml(column)}</th><td>${cell(record[column])}</td></tr>`
  );
  const files = [outputs.csv, outputs.json]
    .filter((file): file is string => Boolean(file))
    .map((file) => `<li>${escapeHtml(file)}</li>`);

  return page(
    `GSTIN ${record.gstin}`,
    [
      `<h1>${escapeHtml(record.gstin)}</h1>`,
      `<table>${rows.join("\n")}</table>`,
      files.length ? `<h2>Saved files</h2><ul>${files.join("")}</ul>` : "",
      '<p><a href="/">New search</a></p>'
    ]
      .filter(Boolean)
      .join("\n")
  );
}
