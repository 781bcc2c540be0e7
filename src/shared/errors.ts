/**
 * PoolError hierarchy — structured error classification.
 *
 * Every error carries a category. Rejected errors are business-rule or input
 * failures the caller may retry with different arguments; fatal errors are
 * computation faults or broken configuration and are never retried.
 */

/** Error severity categories. */
export const ErrorCategory = {
	Rejected: "rejected",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing PoolError subclasses with optional cause chain. */
interface PoolErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & PoolErrorOptions;

/** Base error class for all pool operations. */
export class PoolError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "PoolError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			fatal: this.isFatal,
			context: this.context,
		};
	}
}

// ── Rejected (tier 1) ────────────────────────────────────────────────

/** Zero or otherwise unusable price, quantity or amount. */
export class InvalidArgumentError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_ARGUMENT", ErrorCategory.Rejected, rest);
		this.name = "InvalidArgumentError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Leverage factor below 1x or above the governance maximum. */
export class InvalidLeverageError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"INVALID_LEVERAGE_FACTOR",
			ErrorCategory.Rejected,
			rest,
			"Leverage must be between 10000 (1x) and the governance max_leverage_factor",
		);
		this.name = "InvalidLeverageError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Outstanding market loan would reach the pool utilization allowance. */
export class BorrowLimitExceededError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "BORROW_LIMIT_EXCEEDED", ErrorCategory.Rejected, rest);
		this.name = "BorrowLimitExceededError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Forced unwind yielded more than the liquidation cost. */
export class LiquidateHealthyPositionError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "LIQUIDATE_HEALTHY_POSITION", ErrorCategory.Rejected, rest);
		this.name = "LiquidateHealthyPositionError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A reserve, market or position record does not exist. */
export class RecordNotFoundError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RECORD_NOT_FOUND", ErrorCategory.Rejected, rest);
		this.name = "RecordNotFoundError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A record with the same key was already initialized. */
export class RecordExistsError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RECORD_EXISTS", ErrorCategory.Rejected, rest);
		this.name = "RecordExistsError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Custody could not move funds because the source holds too little. */
export class InsufficientBalanceError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.Rejected, rest);
		this.name = "InsufficientBalanceError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Custody refused a signer that does not own the vault or mint. */
export class UnauthorizedError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNAUTHORIZED", ErrorCategory.Rejected, rest);
		this.name = "UnauthorizedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The venue refused an order outright. */
export class OrderRejectedError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ORDER_REJECTED", ErrorCategory.Rejected, rest);
		this.name = "OrderRejectedError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Fatal (tier 2) ───────────────────────────────────────────────────

/** Overflow, division by zero, negative elapsed time or broken invariant. */
export class ComputationFault extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "COMPUTATION_FAULT", ErrorCategory.Fatal, rest);
		this.name = "ComputationFault";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends PoolError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/**
 * Classify an unknown thrown value. PoolErrors pass through; anything else is
 * an internal computation fault.
 */
export function classifyError(error: unknown): PoolError {
	if (error instanceof PoolError) return error;
	if (error instanceof Error) {
		return new ComputationFault(error.message, { cause: error });
	}
	return new ComputationFault(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for fatal errors of any subtype. */
export function isFatal(e: unknown): e is PoolError {
	return e instanceof PoolError && e.isFatal;
}

/** Type guard for ComputationFault. */
export function isComputationFault(e: unknown): e is ComputationFault {
	return e instanceof ComputationFault;
}

/** Type guard for InvalidLeverageError. */
export function isInvalidLeverage(e: unknown): e is InvalidLeverageError {
	return e instanceof InvalidLeverageError;
}

/** Type guard for BorrowLimitExceededError. */
export function isBorrowLimitExceeded(e: unknown): e is BorrowLimitExceededError {
	return e instanceof BorrowLimitExceededError;
}

/** Type guard for LiquidateHealthyPositionError. */
export function isLiquidateHealthyPosition(e: unknown): e is LiquidateHealthyPositionError {
	return e instanceof LiquidateHealthyPositionError;
}

/** Type guard for InsufficientBalanceError. */
export function isInsufficientBalance(e: unknown): e is InsufficientBalanceError {
	return e instanceof InsufficientBalanceError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
