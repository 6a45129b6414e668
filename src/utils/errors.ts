export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigurationError";
    }
}

export class CollectionDimensionMismatchError extends Error {
    constructor(
        public readonly collection: string,
        public readonly expected: number,
        public readonly actual: number
    ) {
        super(
            `Collection "${collection}" stores vectors of dimension ${actual}, but the embedding model produces ${expected}. ` +
                "Re-run without --append to rebuild the collection."
        );
        this.name = "CollectionDimensionMismatchError";
    }
}

export function toError(value: unknown): Error {
    if (value instanceof Error) {
        return value;
    }

    return new Error(String(value));
}
