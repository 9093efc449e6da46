import type { InitiatorDetail, PortType } from '../../types/host';

type PrefixRule = { prefix: string; portType: PortType };

// Evaluated in order; anything unmatched is a Fibre Channel WWN.
const PREFIX_RULES: readonly PrefixRule[] = [
  { prefix: 'iqn', portType: 'iSCSI' },
  { prefix: 'nqn', portType: 'NVMe' },
];

const FALLBACK_PORT_TYPE: PortType = 'FC';

/**
 * Map a raw initiator identifier to its protocol by prefix alone.
 * The identifier is not otherwise validated.
 */
export function classify(portName: string): PortType {
  const rule = PREFIX_RULES.find((r) => portName.startsWith(r.prefix));
  return rule ? rule.portType : FALLBACK_PORT_TYPE;
}

export function effectivePortType(initiator: Pick<InitiatorDetail, 'portName' | 'portType'>): PortType {
  return initiator.portType ?? classify(initiator.portName);
}
