import { AdmissionControl } from './admission.js';
import { ResultChannel } from './result-channel.js';
import { formatIpv4 } from '../targets/ipv4.js';
import { createLogger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { AddressSet } from '../targets/address-set.js';
import type { ProbeTarget } from '../scanner/endpoint-prober.js';
import type { ProbeResult, ProbeSchedulerOptions, ProbeUnit, ScanSummary, SilentReason } from '../types/scanner.js';

const logger = createLogger('scheduler');

export const DEFAULT_CONCURRENCY = 400;

function emptySilentCounts(): Record<SilentReason, number> {
  return { timeout: 0, refused: 0, unreachable: 0, reset: 0, protocol: 0, 'no-match': 0, error: 0 };
}

/**
 * Fans the address × port cross product out to a prober under one
 * admission control and streams results back in completion order. A slot is
 * held from launch until the consumer takes the unit's result, so at most
 * `concurrency` units are probing or waiting to be read.
 */
export class ProbeScheduler {
  private readonly addresses: AddressSet;
  private readonly ports: readonly number[];
  private readonly prober: ProbeTarget;
  private readonly admission: AdmissionControl;
  private startTime: number | null = null;
  private endTime: number | null = null;
  private counts = { units: 0, matches: 0, open: 0, silent: emptySilentCounts() };

  constructor(
    addresses: AddressSet,
    ports: readonly number[],
    prober: ProbeTarget,
    options: ProbeSchedulerOptions = {},
    admission?: AdmissionControl
  ) {
    this.addresses = addresses;
    this.ports = ports;
    this.prober = prober;
    this.admission = admission ?? new AdmissionControl(options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  get totalUnits(): number {
    return this.addresses.size * this.ports.length;
  }

  /** Address-major, port-minor. */
  *units(): Generator<ProbeUnit> {
    for (const address of this.addresses) {
      for (const port of this.ports) {
        yield { address, port };
      }
    }
  }

  async *run(): AsyncGenerator<ProbeResult, void, undefined> {
    if (this.startTime !== null) {
      throw new Error('ProbeScheduler.run() can only be called once');
    }
    this.startTime = Date.now();
    logger.info(`Scheduling ${this.totalUnits} probe units`, {
      addresses: this.addresses.size,
      ports: this.ports.length,
      concurrency: this.admission.capacity,
    });

    const channel = new ResultChannel<ProbeResult>();
    let stopped = false;

    const launcher = this.launchAll(channel, () => stopped).then(
      () => channel.close(),
      (error: unknown) => channel.fail(error)
    );

    try {
      for await (const result of channel) {
        this.record(result);
        try {
          yield result;
        } finally {
          // A unit holds its slot until the consumer has taken its result
          this.admission.release();
        }
      }
    } finally {
      stopped = true;
      for (let i = channel.takeAll().length; i > 0; i--) {
        this.admission.release();
      }
      await launcher;
      this.endTime = Date.now();
      logger.info('Scan finished', { ...this.summary });
    }
  }

  get summary(): ScanSummary {
    const end = this.endTime ?? Date.now();
    return {
      units: this.counts.units,
      matches: this.counts.matches,
      open: this.counts.open,
      silent: { ...this.counts.silent },
      peakInFlight: this.admission.peakInFlight,
      durationMs: this.startTime === null ? 0 : end - this.startTime,
    };
  }

  private async launchAll(channel: ResultChannel<ProbeResult>, isStopped: () => boolean): Promise<void> {
    for (const unit of this.units()) {
      await this.admission.acquire();
      if (isStopped()) {
        this.admission.release();
        break;
      }

      void this.execute(unit)
        .then((result) => {
          if (isStopped()) {
            this.admission.release();
            return;
          }
          channel.push(result);
        })
        .catch((error: unknown) => {
          logger.error('Failed to deliver probe result', { error: errorMessage(error) });
          this.admission.release();
        });
    }

    await this.admission.drain();
  }

  private async execute(unit: ProbeUnit): Promise<ProbeResult> {
    const startTime = Date.now();
    try {
      return await this.prober.probe(unit);
    } catch (error) {
      const address = formatIpv4(unit.address);
      logger.error(`Probe of ${address}:${unit.port} threw`, { error: errorMessage(error) });
      return { kind: 'silent', address, port: unit.port, reason: 'error', elapsedMs: Date.now() - startTime };
    }
  }

  private record(result: ProbeResult): void {
    this.counts.units++;
    switch (result.kind) {
      case 'match':
        this.counts.matches++;
        break;
      case 'open':
        this.counts.open++;
        break;
      case 'silent':
        this.counts.silent[result.reason]++;
        break;
    }
  }
}
