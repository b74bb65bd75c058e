/** True for an absolute http(s) URL; relative paths, mailto: and tel: are not. */
export function isAbsoluteHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}
