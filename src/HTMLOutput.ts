import { formatText, type FieldArgs, type Output } from "./Output.ts";

interface Frame {
    name: string;
    parts: string[];
    rows: [string, string][];
}

/**
 * Renders the reported structure as a standalone HTML page: one collapsible
 * `<details>` block per group, fields in two-column tables.
 */
export class HTMLOutput implements Output {
    private _title: string;
    private _stack: Frame[];

    constructor(title: string) {
        this._title = title;
        this._stack = [{ name: title, parts: [], rows: [] }];
    }

    begin(name: string) {
        this.flushRows(this.current);
        this._stack.push({ name, parts: [], rows: [] });
    }

    end() {
        if (this._stack.length === 1) throw new Error("end() without matching begin()");
        const frame = this.current;
        this._stack.pop();
        this.flushRows(frame);
        const open = this._stack.length === 1 ? ' open' : '';
        this.current.parts.push(`<details${open}>
<summary>${this.esc(frame.name)}</summary>
<div>
${frame.parts.join('\n')}
</div>
</details>`);
    }

    write(name: string, ...field: FieldArgs) {
        this.current.rows.push([this.esc(name), this.esc(formatText(...field))]);
    }

    render(): string {
        if (this._stack.length !== 1) throw new Error(`${this._stack.length - 1} group(s) left open`);
        const root = this.current;
        this.flushRows(root);
        return [
            this.docHead(),
            '<body>',
            `<h1>PE File Analysis</h1>`,
            `<p class="subtitle">${this.esc(this._title)}</p>`,
            ...root.parts,
            '</body>',
            '</html>',
        ].join('\n');
    }

    private get current(): Frame {
        const frame = this._stack[this._stack.length - 1];
        if (!frame) throw new Error("Output stack is empty");
        return frame;
    }

    private flushRows(frame: Frame) {
        if (frame.rows.length === 0) return;
        frame.parts.push(this.fieldTable(frame.rows));
        frame.rows = [];
    }

    private docHead(): string {
        return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>PE Analysis: ${this.esc(this._title)}</title>
<style>
*{margin:0;padding:0;box-sizing:border-box}
body{font-family:system-ui,-apple-system,sans-serif;line-height:1.6;max-width:1200px;margin:0 auto;padding:2rem;background:#1e1e2e;color:#cdd6f4}
h1{margin-bottom:.25rem;color:#89b4fa}
.subtitle{color:#a6adc8;margin-bottom:1.5rem;font-family:monospace}
details{margin:.75rem 0;border:1px solid #45475a;border-radius:4px;background:#313244}
details>summary{padding:.5rem 1rem;cursor:pointer;font-weight:600;background:#45475a;border-radius:4px 4px 0 0;user-select:none}
details>*:not(summary){padding:.75rem 1rem}
details details{margin:.5rem 0;background:#1e1e2e}
table.fields{border-collapse:collapse;width:100%;font-family:monospace;font-size:.9rem}
table.fields td{padding:.15rem .75rem;vertical-align:top}
table.fields td:first-child{white-space:nowrap;color:#89b4fa;width:1%}
table.fields td:last-child{color:#f9e2af}
</style>
</head>`;
    }

    private fieldTable(rows: [string, string][]): string {
        const trs = rows.map(([name, value]) => `<tr><td>${name}</td><td>${value}</td></tr>`).join('\n');
        return `<table class="fields">\n${trs}\n</table>`;
    }

    private esc(text: string): string {
        return text
            .replace(/&/g, '&amp;')
            .replace(/</g, '&lt;')
            .replace(/>/g, '&gt;')
            .replace(/"/g, '&quot;');
    }
}
