import { ValidationError } from '../errors';
import type { InitiatorDetail, PortType } from '../../types/host';
import { effectivePortType } from './classify';

const CHAP_CAPABLE: ReadonlySet<PortType> = new Set<PortType>(['iSCSI']);

function hasChap(initiator: InitiatorDetail): boolean {
  return Boolean(initiator.chapSingleUsername) || Boolean(initiator.chapMutualUsername);
}

/**
 * Reject CHAP credentials on any initiator whose protocol does not support them.
 * Stops at the first offender.
 */
export function validateInitiatorAuth(initiators: readonly InitiatorDetail[]): void {
  for (const initiator of initiators) {
    if (!hasChap(initiator)) continue;
    const portType = effectivePortType(initiator);
    if (!CHAP_CAPABLE.has(portType)) {
      throw new ValidationError(
        `CHAP authentication is not supported for ${portType} initiator type (initiator '${initiator.portName}')`
      );
    }
  }
}
