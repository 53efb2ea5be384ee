/**
 * Registries over the in-memory driver
 */

import { MemoryDriver, Odm, type ConnectionConfig } from "@microdm/odm";
import { TEST_CONFIG } from "./fixtures.js";

export interface MemoryOdmOptions {
  /** Driver to share between registries (default: a fresh MemoryDriver) */
  driver?: MemoryDriver;
  config?: ConnectionConfig;
}

/**
 * Open a registry over an in-memory driver
 */
export async function openMemoryOdm(
  options: MemoryOdmOptions = {}
): Promise<{ odm: Odm; driver: MemoryDriver }> {
  const driver = options.driver ?? new MemoryDriver();
  const odm = await Odm.open(options.config ?? TEST_CONFIG, { driver });
  return { odm, driver };
}

/**
 * Execute a function with an in-memory registry, closing it after
 * @returns Result of fn
 */
export async function withMemoryOdm<T>(
  fn: (odm: Odm, driver: MemoryDriver) => Promise<T>,
  options: MemoryOdmOptions = {}
): Promise<T> {
  const { odm, driver } = await openMemoryOdm(options);

  let fnError: unknown;
  try {
    return await fn(odm, driver);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    try {
      await odm.close();
    } catch (closeError) {
      if (!fnError) {
        throw closeError;
      }
    }
  }
}
