/**
 * CrossMarginService — collateral deposits and withdrawals for a
 * sub-account's shared margin.
 */

import type { Authorizer, CallerCredential } from "../auth/types.js";
import type { AccountHealth, MarginCalculator } from "../calculator/margin-calculator.js";
import type { ConfigStore } from "../config/config-store.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { MarginError, type OracleError, PositionError } from "../shared/errors.js";
import { type SubAccount, subAccountOf } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerStore } from "../storage/ledger-store.js";
import type { UndoLog } from "../storage/undo-log.js";
import type { EngineEvents } from "./events.js";
import type { CollateralError, CollateralMovement, CollateralRequest } from "./types.js";

export interface CrossMarginServiceDeps {
	readonly authorizer: Authorizer;
	readonly ledger: LedgerStore;
	readonly config: ConfigStore;
	readonly margin: MarginCalculator;
	readonly undo: UndoLog;
	readonly credential: CallerCredential;
	readonly events: EngineEvents;
	readonly logger?: Logger;
}

export class CrossMarginService {
	private readonly authorizer: Authorizer;
	private readonly ledger: LedgerStore;
	private readonly config: ConfigStore;
	private readonly margin: MarginCalculator;
	private readonly undo: UndoLog;
	private readonly credential: CallerCredential;
	private readonly events: EngineEvents;
	private readonly logger: Logger;

	constructor(deps: CrossMarginServiceDeps) {
		this.authorizer = deps.authorizer;
		this.ledger = deps.ledger;
		this.config = deps.config;
		this.margin = deps.margin;
		this.undo = deps.undo;
		this.credential = deps.credential;
		this.events = deps.events;
		this.logger = (deps.logger ?? silentLogger()).child({ module: "cross-margin" });
	}

	/** Credits an accepted collateral token to the sub-account. */
	depositCollateral(
		caller: CallerCredential,
		request: CollateralRequest,
	): Result<CollateralMovement, CollateralError> {
		this.authorizer.assertAuthorized(caller, "depositCollateral");
		const subAccount = subAccountOf(request.primaryAccount, request.subAccountId);
		const checked = this.check(subAccount, request, true);
		if (!checked.ok) return checked;

		this.ledger.increaseTraderBalance(this.credential, subAccount, request.token, request.amount);
		const movement = this.movement(subAccount, request);
		this.logger.info({ ...movement }, "collateral deposited");
		this.events.emit("collateralDeposited", movement);
		return ok(movement);
	}

	/**
	 * Debits collateral, provided the balance covers it and the account's
	 * equity still meets its initial margin afterwards.
	 */
	withdrawCollateral(
		caller: CallerCredential,
		request: CollateralRequest,
	): Result<CollateralMovement, CollateralError> {
		this.authorizer.assertAuthorized(caller, "withdrawCollateral");
		const subAccount = subAccountOf(request.primaryAccount, request.subAccountId);
		const checked = this.check(subAccount, request, false);
		if (!checked.ok) return checked;

		const result = this.undo.atomic<AccountHealth, MarginError | OracleError>(() => {
			const balance = this.ledger.traderBalance(subAccount, request.token);
			if (balance < request.amount) {
				return err(
					new MarginError("InsufficientCollateralBalance", "Withdrawal exceeds the token balance", {
						subAccount,
						token: request.token,
						balance,
						amount: request.amount,
					}),
				);
			}
			this.ledger.decreaseTraderBalance(this.credential, subAccount, request.token, request.amount);
			return this.margin.validateWithdraw(subAccount);
		});
		if (!result.ok) {
			this.logger.warn({ subAccount, code: result.error.code }, "withdrawal rejected");
			return result;
		}

		const movement = this.movement(subAccount, request);
		this.logger.info({ ...movement }, "collateral withdrawn");
		this.events.emit("collateralWithdrawn", movement);
		return ok(movement);
	}

	private check(
		subAccount: SubAccount,
		request: CollateralRequest,
		isDeposit: boolean,
	): Result<void, CollateralError> {
		if (request.amount <= 0n) {
			return err(
				new MarginError("InvalidCollateralAmount", "Collateral amount must be positive", {
					subAccount,
					amount: request.amount,
				}),
			);
		}
		const token = this.config.collateralToken(request.token);
		if (!token || (isDeposit && !token.accepted)) {
			return err(
				new PositionError(
					"TokenNotAccepted",
					`Token ${request.token} is not accepted as collateral`,
					{ token: request.token },
				),
			);
		}
		return ok(undefined);
	}

	private movement(subAccount: SubAccount, request: CollateralRequest): CollateralMovement {
		return {
			subAccount,
			token: request.token,
			amount: request.amount,
			balance: this.ledger.traderBalance(subAccount, request.token),
		};
	}
}
