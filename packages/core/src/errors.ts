/**
 * Error taxonomy for the report pipeline.
 *
 * NotFoundError, IoError and SchemaError abort the run.
 * InvalidAmountError is row-level and recovered by the aggregator.
 */

export class ReportError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Input file does not exist.
 */
export class NotFoundError extends ReportError {
    readonly path: string;

    constructor(path: string, options?: { cause?: unknown }) {
        super(`No se pudo encontrar el archivo '${path}'`, options);
        this.path = path;
    }
}

/**
 * Read, write or decoding failure.
 */
export class IoError extends ReportError {
    readonly path?: string;

    constructor(message: string, path?: string, options?: { cause?: unknown }) {
        super(message, options);
        this.path = path;
    }
}

/**
 * CSV header lacks one or more required columns. The whole file is rejected.
 */
export class SchemaError extends ReportError {
    readonly missingColumns: string[];

    constructor(requiredColumns: readonly string[], missingColumns: string[]) {
        super(
            `El archivo CSV debe contener las columnas: ${requiredColumns.join(', ')} ` +
            `(faltan: ${missingColumns.join(', ')})`
        );
        this.missingColumns = missingColumns;
    }
}

export class InvalidAmountError extends ReportError {
    readonly txnId: string;
    readonly rawAmount: string;

    constructor(txnId: string, rawAmount: string) {
        super(`Monto inválido en la transacción ${txnId}: ${rawAmount}`);
        this.txnId = txnId;
        this.rawAmount = rawAmount;
    }
}
