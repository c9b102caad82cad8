/**
 * ProofpassService — Composition root for one deployment.
 *
 * Route handlers delegate to this service; they never wire registries
 * themselves. The service owns the deployment, logs every committed
 * domain event, and answers the readiness probe.
 */

import type { Logger } from "pino";
import type { Address } from "@proofpass/types";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  Subscription,
} from "@proofpass/event-store";
import type { ConservationReport, TransferReceipt } from "@proofpass/ledger";
import { createDeployment } from "@proofpass/coordinator";
import type { Deployment, DeploymentConfig } from "@proofpass/coordinator";

// =============================================================================
// Configuration
// =============================================================================

export interface ProofpassServiceConfig {
  readonly deployment: DeploymentConfig;

  /** Receives one debug line per committed domain event. */
  readonly logger?: Logger | undefined;

  /** Allow POST /api/v1/faucet to create value. Development only. */
  readonly enableFaucet?: boolean | undefined;
}

export interface HealthReport {
  readonly healthy: boolean;
  readonly integrity: EventStoreIntegrityResult;
  readonly conservation: ConservationReport;
}

// =============================================================================
// Service
// =============================================================================

export class ProofpassService {
  readonly deployment: Deployment;
  readonly faucetEnabled: boolean;

  private readonly _subscription: Subscription | undefined;
  private _ready = false;

  constructor(config: ProofpassServiceConfig) {
    this.deployment = createDeployment(config.deployment);
    this.faucetEnabled = config.enableFaucet ?? false;

    const logger = config.logger;
    this._subscription =
      logger === undefined
        ? undefined
        : this.deployment.runtime.eventStore.subscribeAll((stored) => {
            logger.debug(
              {
                type: stored.event.type,
                stream: stored.streamId,
                position: stored.globalPosition,
                actor: stored.event.metadata.actor,
                correlationId: stored.event.metadata.correlationId,
              },
              "domain event committed",
            );
          });

    this._ready = this.checkHealth().healthy;
  }

  get coordinator(): Deployment["coordinator"] {
    return this.deployment.coordinator;
  }

  get attendance(): Deployment["attendance"] {
    return this.deployment.attendance;
  }

  get collectible(): Deployment["collectible"] {
    return this.deployment.collectible;
  }

  get attestation(): Deployment["attestation"] {
    return this.deployment.attestation;
  }

  // ─── Funds ─────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this.deployment.runtime.ledger.balanceOf(address);
  }

  /**
   * Create value for an address. Callers check `faucetEnabled` first.
   */
  fund(address: Address, amount: bigint): TransferReceipt {
    return this.deployment.runtime.ledger.fund(address, amount, "faucet");
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.deployment.runtime.eventStore.readAll(options);
  }

  // ─── Health ────────────────────────────────────────────────────────

  /**
   * Hash chain of the event store plus value conservation of the ledger.
   */
  checkHealth(): HealthReport {
    const integrity = this.deployment.runtime.eventStore.verifyIntegrity();
    const conservation = this.deployment.runtime.ledger.verifyConservation();
    return {
      healthy: integrity.valid && conservation.balanced,
      integrity,
      conservation,
    };
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._subscription?.unsubscribe();
    this._ready = false;
  }
}
