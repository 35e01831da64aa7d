export class InvalidReadingError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid reading: ${issues.join('; ')}`);
        this.name = 'InvalidReadingError';
        this.issues = issues;
    }
}
