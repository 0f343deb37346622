/**
 * Valve control functions
 * Reads and drives valve ports through the device interface
 */

import type { DeviceInterface } from '$types/device';
import type { ValvePortId, ValveState, ValveStates } from '$types/common';
import { DeviceUnavailableError } from '$types/errors';
import { portToChannel, levelToState, stateToLevel } from './helpers';

/**
 * Read the state of one valve
 *
 * A failed read is not an error for the caller: the state is simply
 * unknown until the next successful read.
 *
 * @param device - Device interface (normally the serialized wrapper)
 * @param port - Valve port to read
 * @returns Valve state, or null when the device could not be read
 */
export async function readValveState(
  device: DeviceInterface,
  port: ValvePortId
): Promise<ValveState | null> {
  try {
    const level = await device.getPortState(portToChannel(port));
    return levelToState(level);
  } catch {
    return null;
  }
}

/**
 * Read all four valves in port order
 * @param device - Device interface
 * @returns State per port, null for ports that could not be read
 */
export async function readAllValves(device: DeviceInterface): Promise<ValveStates> {
  return {
    1: await readValveState(device, 1),
    2: await readValveState(device, 2),
    3: await readValveState(device, 3),
    4: await readValveState(device, 4),
  };
}

/**
 * Drive a valve to the given state
 *
 * @param device - Device interface
 * @param port - Valve port to drive
 * @param state - Desired state
 * @throws {DeviceUnavailableError} When the device rejects the write
 */
export async function setValveState(
  device: DeviceInterface,
  port: ValvePortId,
  state: ValveState
): Promise<void> {
  try {
    await device.setPortState(portToChannel(port), stateToLevel(state));
  } catch (err) {
    if (err instanceof DeviceUnavailableError) throw err;
    throw new DeviceUnavailableError('setPortState', err);
  }
}
