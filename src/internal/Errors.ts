export class NoSuchElementException extends Error {
    constructor() {
        super("No such element")
    }
}

/**
 * One-line description of a thrown value for log messages.
 */
export function describe(error: unknown): string {
    if (typeof error === "object" && error !== null && "message" in error) {
        const name = "name" in error ? `${error.name}: ` : ""
        return `${name}${error.message}`
    }
    return String(error)
}
