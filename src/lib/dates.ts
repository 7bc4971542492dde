// Trello renders every timestamp as YYYY-MM-DDThh:mm:ss.sssZ
const TRELLO_DATE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{3})Z$/;

/**
 * Parses a timestamp in Trello's fixed wire format. Anything else, including
 * calendar-invalid values such as month 13, yields `undefined`.
 */
export function parseTrelloDate(value: string | null | undefined): Date | undefined {
    if (!value) return undefined;

    const match = TRELLO_DATE.exec(value);
    if (!match) return undefined;

    const [year, month, day, hour, minute, second, millis] = match.slice(1).map(part => parseInt(part, 10));
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));

    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day ||
        date.getUTCHours() !== hour ||
        date.getUTCMinutes() !== minute ||
        date.getUTCSeconds() !== second
    ) {
        return undefined;
    }
    return date;
}

/**
 * Renders `date` as the wall-clock time of `timeZone` in the
 * `YYYY-MM-DDThh:mm:ssZ` shape Dropbox takes for `client_modified`.
 */
export function formatClientModified(date: Date, timeZone: string): string {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(date);

    const part = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find(p => p.type === type)?.value ?? '00';

    return `${part('year')}-${part('month')}-${part('day')}T${part('hour')}:${part('minute')}:${part('second')}Z`;
}

export function toIsoOrNull(date: Date | undefined): string | null {
    return date ? date.toISOString() : null;
}
