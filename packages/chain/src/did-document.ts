import type { ActiveIdentityState } from '@plclog/types';
import { keyMultibase } from '@plclog/keys';

export const DID_DOCUMENT_CONTEXT = [
  'https://www.w3.org/ns/did/v1',
  'https://w3id.org/security/multikey/v1',
  'https://w3id.org/security/suites/secp256k1-2019/v1',
] as const;

export interface VerificationMethodEntry {
  id: string;
  type: 'Multikey';
  controller: string;
  publicKeyMultibase: string;
}

export interface ServiceEntry {
  id: string;
  type: string;
  serviceEndpoint: string;
}

export interface DidDocument {
  '@context': readonly string[];
  id: string;
  alsoKnownAs: string[];
  verificationMethod: VerificationMethodEntry[];
  service: ServiceEntry[];
}

/** Render an active identity as a W3C DID document. */
export function buildDidDocument(did: string, state: ActiveIdentityState): DidDocument {
  return {
    '@context': DID_DOCUMENT_CONTEXT,
    id: did,
    alsoKnownAs: [...state.alsoKnownAs],
    verificationMethod: Object.entries(state.verificationMethods).map(([name, key]) => ({
      id: `${did}#${name}`,
      type: 'Multikey',
      controller: did,
      publicKeyMultibase: keyMultibase(key),
    })),
    service: Object.entries(state.services).map(([name, service]) => ({
      id: `#${name}`,
      type: service.type,
      serviceEndpoint: service.endpoint,
    })),
  };
}
