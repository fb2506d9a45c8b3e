import fs from 'fs';
import path from 'path';

/** Version from package.json, two levels above both src/utils and dist/utils. */
export function readVersion(): string {
    try {
        const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '../../package.json'), 'utf-8'));
        if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
            return raw.version;
        }
    } catch {
        return '0.0.0';
    }
    return '0.0.0';
}
