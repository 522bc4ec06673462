import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry } from 'prom-client';
import { AuthResult } from '../interfaces/auth-result.interface';

export type AuthFlow =
  | 'sign_up'
  | 'sign_in'
  | 'refresh'
  | 'sign_out'
  | 'verify_email'
  | 'reset_password'
  | 'oauth_initiate'
  | 'oauth_callback';

@Injectable()
export class AuthMetricsService {
  // Own registry so that several app instances (tests) never collide on metric names
  private readonly registry = new Registry();

  private readonly attemptsCounter: Counter<'flow' | 'provider'>;
  private readonly successCounter: Counter<'flow' | 'provider'>;
  private readonly failureCounter: Counter<'flow' | 'provider' | 'error_kind'>;
  private readonly newUserCounter: Counter<'provider'>;
  private readonly latencyHistogram: Histogram<'flow' | 'provider'>;

  constructor() {
    this.attemptsCounter = new Counter({
      name: 'auth_attempts_total',
      help: 'Total number of authentication flow attempts',
      labelNames: ['flow', 'provider'],
      registers: [this.registry],
    });

    this.successCounter = new Counter({
      name: 'auth_success_total',
      help: 'Total number of authentication flows that succeeded',
      labelNames: ['flow', 'provider'],
      registers: [this.registry],
    });

    this.failureCounter = new Counter({
      name: 'auth_failure_total',
      help: 'Total number of authentication flows that failed, by error kind',
      labelNames: ['flow', 'provider', 'error_kind'],
      registers: [this.registry],
    });

    this.newUserCounter = new Counter({
      name: 'auth_new_user_registration_total',
      help: 'Total number of new user registrations',
      labelNames: ['provider'],
      registers: [this.registry],
    });

    this.latencyHistogram = new Histogram({
      name: 'auth_latency_seconds',
      help: 'Authentication flow latency in seconds',
      labelNames: ['flow', 'provider'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5],
      registers: [this.registry],
    });
  }

  /**
   * Runs a flow and records attempt, outcome and latency. Thrown errors are
   * counted as `error_kind="exception"` and rethrown.
   */
  async track<T>(
    flow: AuthFlow,
    provider: string,
    operation: () => Promise<AuthResult<T>>,
  ): Promise<AuthResult<T>> {
    this.attemptsCounter.inc({ flow, provider });
    const stopTimer = this.latencyHistogram.startTimer({ flow, provider });
    try {
      const result = await operation();
      if (result.ok) {
        this.successCounter.inc({ flow, provider });
      } else {
        this.failureCounter.inc({ flow, provider, error_kind: result.error.kind });
      }
      return result;
    } catch (error) {
      this.failureCounter.inc({ flow, provider, error_kind: 'exception' });
      throw error;
    } finally {
      stopTimer();
    }
  }

  recordNewUser(provider: string): void {
    this.newUserCounter.inc({ provider });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }
}
