/**
 * LeverageEngine — the public operation surface.
 *
 * Every mutating operation runs as one unit:
 *   1. read the clock once,
 *   2. run the body inside `host.atomic()` (custody and venue effects revert on failure),
 *   3. commit changed records to the store, still inside the atomic scope,
 *   4. log and publish the event only after the commit.
 *
 * Nothing throws across this class's public methods; thrown faults come back
 * as `err(ComputationFault)` through `classifyError`.
 */

import type { AtomicHost, Custodian } from "../custody/types.js";
import type { Governance } from "../governance/governance.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { Rate, TokenAmount } from "../math/fixed-point.js";
import { UnixTimestamp } from "../math/timestamp.js";
import type { RecordStore } from "../persistence/record-store.js";
import {
	EMPTY_POSITION_STATE,
	type MarketRecord,
	type PositionRecord,
	PositionStatus,
} from "../position/types.js";
import type { ReserveRecord } from "../reserve/types.js";
import {
	InvalidArgumentError,
	type PoolError,
	RecordExistsError,
	RecordNotFoundError,
	classifyError,
} from "../shared/errors.js";
import type { ReserveId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import { err, ok, tryCatchAsync } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import type { Venue } from "../venue/types.js";
import type { OperationContext, OperationResult, Outcome } from "./context.js";
import { loadReserve } from "./context.js";
import type { EngineEvent, EngineEvents } from "./events.js";
import { closePosition, liquidatePosition, openPosition } from "./position-operations.js";
import { collectTreasury, deposit, reserveMetrics, withdraw } from "./reserve-operations.js";
import type {
	ClosePositionReceipt,
	ClosePositionRequest,
	CollectTreasuryRequest,
	DepositReceipt,
	DepositRequest,
	InitializeMarketRequest,
	InitializePositionRequest,
	InitializeReserveRequest,
	LeverageEngineDeps,
	LiquidatePositionRequest,
	LiquidationReceipt,
	OpenPositionReceipt,
	OpenPositionRequest,
	ReserveMetrics,
	WithdrawReceipt,
	WithdrawRequest,
} from "./types.js";

export class LeverageEngine {
	readonly events: TypedEmitter<EngineEvents>;

	private readonly store: RecordStore;
	private readonly venue: Venue;
	private readonly custodian: Custodian;
	private readonly host: AtomicHost;
	private readonly governance: Governance;
	private readonly clock: Clock;
	private readonly logger: Logger;
	/** Tail of the operation queue; each operation starts after the previous one settles. */
	private queue: Promise<unknown> = Promise.resolve();

	constructor(deps: LeverageEngineDeps) {
		this.store = deps.store;
		this.venue = deps.venue;
		this.custodian = deps.custodian;
		this.host = deps.host;
		this.governance = deps.governance;
		this.clock = deps.clock ?? SystemClock;
		this.logger = deps.logger ?? createLogger({ level: "warn", name: "leverage-engine" });
		this.events = new TypedEmitter<EngineEvents>({
			onListenerError: (event, error) => {
				this.logger.error({ event, error: String(error) }, "Event listener failed");
			},
		});
	}

	// ── Record creation ────────────────────────────────────────────

	initializeReserve(request: InitializeReserveRequest): Promise<Result<ReserveRecord, PoolError>> {
		return this.run<ReserveRecord>("initializeReserve", { reserveId: request.id }, async (ctx) => {
			if (await ctx.store.reserve(request.id)) {
				return err(new RecordExistsError(`Reserve ${request.id} already exists`, { reserveId: request.id }));
			}
			const vault = await ctx.custodian.balance(request.lendableVault);
			if (!vault.ok) return vault;
			const supply = await ctx.custodian.supply(request.redeemableMint);
			if (!supply.ok) return supply;

			const reserve: ReserveRecord = {
				...request,
				state: {
					borrowRate: Rate.ZERO,
					treasureAccrued: TokenAmount.ZERO,
					treasurerUpdate: ctx.timestamp,
				},
				debt: { averageRate: Rate.ZERO, total: TokenAmount.ZERO, lastUpdate: ctx.timestamp },
			};
			return ok({ value: reserve, changes: { reserves: [reserve] } });
		});
	}

	/** The market's quote asset must be the reserve's lendable asset. */
	initializeMarket(request: InitializeMarketRequest): Promise<Result<MarketRecord, PoolError>> {
		return this.run<MarketRecord>("initializeMarket", { marketId: request.id }, async (ctx) => {
			if (await ctx.store.market(request.id)) {
				return err(new RecordExistsError(`Market ${request.id} already exists`, { marketId: request.id }));
			}
			const reserve = await loadReserve(ctx.store, request.reserveId);
			if (!reserve.ok) return reserve;
			if (reserve.value.lendableMint !== request.quoteMint) {
				return err(
					new InvalidArgumentError("Market quote mint must be the reserve's lendable mint", {
						quoteMint: request.quoteMint,
						lendableMint: reserve.value.lendableMint,
					}),
				);
			}
			const lots = await ctx.venue.lotSizes(request.id);
			if (!lots.ok) return lots;

			const market: MarketRecord = { ...request, state: { totalLoan: TokenAmount.ZERO } };
			return ok({ value: market, changes: { markets: [market] } });
		});
	}

	initializePosition(request: InitializePositionRequest): Promise<Result<PositionRecord, PoolError>> {
		const fields = { marketId: request.marketId, trader: request.trader };
		return this.run<PositionRecord>("initializePosition", fields, async (ctx) => {
			if (!(await ctx.store.market(request.marketId))) {
				return err(new RecordNotFoundError(`Market ${request.marketId} not found`, fields));
			}
			if (await ctx.store.position(request.marketId, request.trader)) {
				return err(new RecordExistsError("Position already exists", fields));
			}
			const receipts = await ctx.custodian.balance(request.receiptAccount);
			if (!receipts.ok) return receipts;

			const position: PositionRecord = {
				...request,
				status: PositionStatus.Uninitialized,
				state: EMPTY_POSITION_STATE,
			};
			return ok({ value: position, changes: { positions: [position] } });
		});
	}

	// ── Liquidity provision ────────────────────────────────────────

	deposit(request: DepositRequest): Promise<Result<DepositReceipt, PoolError>> {
		return this.run("deposit", { reserveId: request.reserveId }, (ctx) => deposit(ctx, request));
	}

	withdraw(request: WithdrawRequest): Promise<Result<WithdrawReceipt, PoolError>> {
		return this.run("withdraw", { reserveId: request.reserveId }, (ctx) => withdraw(ctx, request));
	}

	collectTreasury(request: CollectTreasuryRequest): Promise<Result<TokenAmount, PoolError>> {
		return this.run("collectTreasury", { reserveId: request.reserveId }, (ctx) =>
			collectTreasury(ctx, request),
		);
	}

	// ── Positions ──────────────────────────────────────────────────

	openPosition(request: OpenPositionRequest): Promise<Result<OpenPositionReceipt, PoolError>> {
		const fields = { marketId: request.marketId, trader: request.trader };
		return this.run("openPosition", fields, (ctx) => openPosition(ctx, request));
	}

	closePosition(request: ClosePositionRequest): Promise<Result<ClosePositionReceipt, PoolError>> {
		const fields = { marketId: request.marketId, trader: request.trader };
		return this.run("closePosition", fields, (ctx) => closePosition(ctx, request));
	}

	liquidatePosition(request: LiquidatePositionRequest): Promise<Result<LiquidationReceipt, PoolError>> {
		const fields = { marketId: request.marketId, trader: request.trader };
		return this.run("liquidatePosition", fields, (ctx) => liquidatePosition(ctx, request));
	}

	// ── Reporting ──────────────────────────────────────────────────

	/** Read-only; never commits. */
	reserveMetrics(reserveId: ReserveId): Promise<Result<ReserveMetrics, PoolError>> {
		return this.serialize(() =>
			tryCatchAsync(() => reserveMetrics(this.context(), reserveId), classifyError),
		);
	}

	// ── Internal ───────────────────────────────────────────────────

	private context(): OperationContext {
		return {
			store: this.store,
			venue: this.venue,
			custodian: this.custodian,
			governance: this.governance,
			timestamp: UnixTimestamp.now(this.clock),
		};
	}

	private serialize<T>(task: () => Promise<T>): Promise<T> {
		const next = this.queue.then(task, task);
		this.queue = next;
		return next;
	}

	private run<T>(
		operation: string,
		fields: Record<string, unknown>,
		body: (ctx: OperationContext) => OperationResult<T>,
	): Promise<Result<T, PoolError>> {
		return this.serialize(() => this.execute(operation, fields, body));
	}

	private async execute<T>(
		operation: string,
		fields: Record<string, unknown>,
		body: (ctx: OperationContext) => OperationResult<T>,
	): Promise<Result<T, PoolError>> {
		const result = await tryCatchAsync(
			() =>
				this.host.atomic(async (): OperationResult<T> => {
					const outcome = await body(this.context());
					if (outcome.ok) await this.store.commit(outcome.value.changes);
					return outcome;
				}),
			classifyError,
		);

		if (!result.ok) {
			this.report(operation, fields, result.error);
			return result;
		}
		this.committed(operation, fields, result.value);
		return ok(result.value.value);
	}

	private committed<T>(operation: string, fields: Record<string, unknown>, outcome: Outcome<T>): void {
		this.logger.info({ operation, ...fields, ...outcome.fields }, `${operation} committed`);
		if (outcome.event) this.publish(outcome.event);
	}

	private report(operation: string, fields: Record<string, unknown>, error: PoolError): void {
		const line = { operation, ...fields, code: error.code, context: error.context };
		if (error.isFatal) {
			this.logger.error(line, `${operation} failed: ${error.message}`);
		} else {
			this.logger.warn(line, `${operation} rejected: ${error.message}`);
		}
	}

	private publish(event: EngineEvent): void {
		switch (event.type) {
			case "reserve_deposited":
				this.events.emit("reserve_deposited", event);
				break;
			case "reserve_withdrawn":
				this.events.emit("reserve_withdrawn", event);
				break;
			case "treasury_collected":
				this.events.emit("treasury_collected", event);
				break;
			case "position_opened":
				this.events.emit("position_opened", event);
				break;
			case "position_closed":
				this.events.emit("position_closed", event);
				break;
			case "position_liquidated":
				this.events.emit("position_liquidated", event);
				break;
		}
	}
}
