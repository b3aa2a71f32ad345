/**
 * Model Service Health Checks
 *
 * Embedding and chat completion endpoints, checked in parallel.
 *
 * @module @docpilot/rag/generation/health
 */

import type { ComponentHealth } from '../types';

export interface HealthCheckable {
  healthCheck(): Promise<ComponentHealth>;
}

/**
 * Combined health status for the model services
 */
export interface ModelHealthStatus {
  llm: ComponentHealth;
  embedding: ComponentHealth;
  allHealthy: boolean;
}

export class ModelHealthChecker {
  private llm: HealthCheckable;
  private embedder: HealthCheckable;

  constructor(services: { llm: HealthCheckable; embedder: HealthCheckable }) {
    this.llm = services.llm;
    this.embedder = services.embedder;
  }

  async checkAll(): Promise<ModelHealthStatus> {
    const [llm, embedding] = await Promise.all([this.check(this.llm), this.check(this.embedder)]);
    return { llm, embedding, allHealthy: llm.healthy && embedding.healthy };
  }

  /**
   * Readiness check (both services must be functional)
   */
  async readiness(): Promise<boolean> {
    const status = await this.checkAll();
    return status.allHealthy;
  }

  private async check(service: HealthCheckable): Promise<ComponentHealth> {
    try {
      return await service.healthCheck();
    } catch (error) {
      return { healthy: false, message: error instanceof Error ? error.message : String(error) };
    }
  }
}

export function createHealthChecker(services: {
  llm: HealthCheckable;
  embedder: HealthCheckable;
}): ModelHealthChecker {
  return new ModelHealthChecker(services);
}
