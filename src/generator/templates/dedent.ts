/**
 * Dedent utility for template literals
 * Removes the template's leading indentation and re-indents interpolated
 * multi-line values to the column they are placed at.
 */

const PLACEHOLDER = "\u0000";

/**
 * Remove common leading whitespace from a template literal.
 *
 * Indentation is measured on the template text only. A value spanning several
 * lines gets the indentation of the line it is interpolated on, so generated
 * blocks can be nested:
 *
 * ```ts
 * dedent`
 *     switch (x) {
 *         ${cases}
 *     }
 * `;
 * ```
 */
export function dedent(strings: TemplateStringsArray, ...values: unknown[]): string {
    const lines = strings.join(PLACEHOLDER).split("\n");

    // Remove first line if it's empty
    if (lines.length > 0 && lines[0]?.trim() === "") {
        lines.shift();
    }

    // Remove last line if it's empty
    if (lines.length > 0 && lines[lines.length - 1]?.trim() === "") {
        lines.pop();
    }

    let minIndent = Infinity;
    for (const line of lines) {
        if (line.trim() === "") continue;
        const indent = line.match(/^[ \t]*/)?.[0].length ?? 0;
        minIndent = Math.min(minIndent, indent);
    }
    if (minIndent === Infinity) minIndent = 0;

    let next = 0;
    return lines
        .map((line) => {
            const stripped = line.trim() === "" ? "" : line.slice(minIndent);
            const indent = stripped.match(/^[ \t]*/)?.[0] ?? "";
            const filled = stripped.replace(new RegExp(PLACEHOLDER, "g"), () =>
                String(values[next++] ?? "").replace(/\n/g, `\n${indent}`),
            );
            return filled.trim() === "" ? "" : filled.replace(/[ \t]+$/gm, "");
        })
        .join("\n");
}
