export const OS_TYPES = ['Windows', 'Linux', 'ESXi', 'AIX', 'HP-UX', 'Solaris'] as const;
export type OsType = (typeof OS_TYPES)[number];

export const PORT_TYPES = ['iSCSI', 'FC', 'NVMe'] as const;
export type PortType = (typeof PORT_TYPES)[number];

export const HOST_CONNECTIVITY = [
  'Local_Only',
  'Metro_Optimize_Both',
  'Metro_Optimize_Local',
  'Metro_Optimize_Remote',
] as const;
export type HostConnectivity = (typeof HOST_CONNECTIVITY)[number];

export type DesiredExistence = 'present' | 'absent';

export type InitiatorIntent = 'present-in-host' | 'absent-in-host';

export type ChapCredentials = {
  chapSingleUsername?: string;
  chapSinglePassword?: string;
  chapMutualUsername?: string;
  chapMutualPassword?: string;
};

export type InitiatorDetail = ChapCredentials & {
  portName: string;
  portType?: PortType;
};

/** Desired state of one host, built per request. */
export type HostSpec = {
  name?: string;
  id?: string;
  osType?: OsType;
  initiators?: string[];
  detailedInitiators?: InitiatorDetail[];
  desiredExistence: DesiredExistence;
  initiatorIntent?: InitiatorIntent;
  newName?: string;
  connectivity?: HostConnectivity;
};

export type InitiatorSession = Record<string, unknown>;

export type ObservedInitiator = {
  portName: string;
  portType: string;
  chapSingleUsername: string | null;
  chapMutualUsername: string | null;
  activeSessions: InitiatorSession[];
};

export type ObservedHost = {
  id: string;
  name: string;
  osType: string;
  connectivity: string;
  hostInitiators: ObservedInitiator[];
};

export type HostSummary = {
  id: string;
  name: string;
};

/** Initiator as sent on create / add, with its port type resolved. */
export type InitiatorRequest = ChapCredentials & {
  portName: string;
  portType: PortType;
};

export type CreateHostParams = {
  name: string;
  osType: OsType;
  initiators: InitiatorRequest[];
  connectivity?: HostConnectivity;
};

export type ModifyHostParams = {
  addInitiators?: InitiatorRequest[];
  removeInitiators?: string[];
  name?: string;
  connectivity?: HostConnectivity;
};

export type EmptyHostDetails = Record<string, never>;

export type ReconcileResult = {
  changed: boolean;
  hostDetails: ObservedHost | EmptyHostDetails;
};
