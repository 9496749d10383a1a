// services/bridge/src/dashboard/page.ts

import type { StatusView } from './view.js'

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
}

export function escapeHtml(value: unknown): string {
    return String(value).replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch)
}

/** Missing values render as an em dash, present ones with their unit. */
function show(value: number | string | null | undefined, unit = ''): string {
    if (value === null || value === undefined || value === '') return '—'
    return escapeHtml(unit ? `${value} ${unit}` : String(value))
}

export const PAGE_TITLE = 'Inverter → PVOutput'

export function renderDashboardPage(view: StatusView): string {
    const { status, dataQuality: dq, inverter, today, uploader } = view
    const mode = uploader.mode === 'dry-run' ? 'DRY RUN' : 'LIVE'

    const rows: Array<[string, string]> = [
        ['Power', show(inverter.powerW ?? 0, 'W')],
        ['Energy Today', show(today.energyKwh.toFixed(3), 'kWh')],
        ['Lifetime Energy', show(inverter.lifetimeEnergyKwh, 'kWh')],
        ['AC Voltage', show(inverter.voltageV, 'V')],
        ['Temp', show(inverter.temperatureC, '°C')],
        ['Freq', show(inverter.frequencyHz, 'Hz')],
        ['PVOutput Mode', mode],
        ['Last Poll', show(inverter.lastPoll)],
        ['Last Upload', show(uploader.lastUpload)],
        ['Uptime', show(today.uptime)],
    ]

    const statusRows = rows
        .map(([label, value]) => `<div class="row"><b>${label}:</b> <span>${value}</span></div>`)
        .join('\n')

    const errorRow = uploader.lastError
        ? `<div class="row warn"><b>Last Error:</b> <span>${escapeHtml(uploader.lastError)}</span></div>`
        : ''

    return `<!doctype html>
<html>
<head>
<meta charset="utf-8"/>
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(PAGE_TITLE)} (${escapeHtml(status.text)})</title>
<link rel="stylesheet" href="/static/dashboard.css">
</head>
<body>
<h2>
${escapeHtml(PAGE_TITLE)}
<span class="pill ${escapeHtml(status.tone)}">${escapeHtml(status.text)}</span>
<span class="${escapeHtml(dq.tone)}" title="Data Quality: ${escapeHtml(dq.text)}"></span>
</h2>
<div class="layout">
<div class="status">
${statusRows}
${errorRow}
<a href="/raw">Diagnostics / raw</a>
</div>
<div class="chart"><canvas id="chart"></canvas></div>
</div>
<script src="/vendor/chart.js/chart.umd.js"></script>
<script src="/static/dashboard.js"></script>
</body>
</html>
`
}
