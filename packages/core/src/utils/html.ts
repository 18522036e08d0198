export function escapeHtml(s: string): string {
    return s
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;");
}

const LONG_DATE = new Intl.DateTimeFormat("en-US", {
    month: "long",
    day: "2-digit",
    year: "numeric",
    timeZone: "UTC",
});

export const NO_DATE = "No date";

/**
 * Formats as "March 01, 2024", or "No date" when absent.
 */
export function formatLongDate(date: Date | null): string {
    return date ? LONG_DATE.format(date) : NO_DATE;
}

/**
 * Replaces `{{NAME}}` placeholders. Unknown placeholders are kept as-is and
 * values are inserted literally.
 */
export function fillTemplate(
    template: string,
    values: Record<string, string>,
): string {
    return template.replace(/\{\{([A-Z_]+)\}\}/g, (match, key: string) =>
        Object.prototype.hasOwnProperty.call(values, key) ? values[key] : match,
    );
}
