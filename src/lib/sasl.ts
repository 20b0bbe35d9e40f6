/**
 * SASL interactive bind support
 *
 * SaslDefaults is the callback context of an interactive bind: mechanisms
 * ask it for the values they need through `interact()`, the way a SASL
 * library prompts its interaction callback.
 */

export type SaslPrompt = 'user' | 'authname' | 'pass' | 'realm';

export interface SaslDefaultsInit {
  mechanism: string;
  realm?: string;
  authenticationID?: string;
  password?: string;
  authorizationID?: string;
}

export class SaslDefaults {
  readonly mechanism: string;
  readonly realm: string;
  readonly authcid: string;
  readonly passwd: string;
  readonly authzid: string;

  constructor(init: SaslDefaultsInit) {
    this.mechanism = init.mechanism.toUpperCase();
    this.realm = init.realm ?? '';
    this.authcid = init.authenticationID ?? '';
    this.passwd = init.password ?? '';
    this.authzid = init.authorizationID ?? '';
  }

  interact(prompt: SaslPrompt): string {
    switch (prompt) {
      case 'user':
        return this.authzid;
      case 'authname':
        return this.authcid;
      case 'pass':
        return this.passwd;
      case 'realm':
        return this.realm;
    }
  }
}

export interface SaslMechanism {
  readonly name: string;
  initialResponse(defaults: SaslDefaults): string;
}

// RFC 4616
const plain: SaslMechanism = {
  name: 'PLAIN',
  initialResponse: defaults =>
    [
      defaults.interact('user'),
      defaults.interact('authname'),
      defaults.interact('pass'),
    ].join('\0'),
};

// RFC 4422 appendix A, identity comes from the TLS layer
const external: SaslMechanism = {
  name: 'EXTERNAL',
  initialResponse: defaults => defaults.interact('user'),
};

const mechanisms = new Map<string, SaslMechanism>(
  [plain, external].map((m): [string, SaslMechanism] => [m.name, m])
);

export const supportedSaslMechanisms = (): string[] => [...mechanisms.keys()];

export function getSaslMechanism(name: string): SaslMechanism {
  const mechanism = mechanisms.get(name.toUpperCase());
  if (!mechanism) {
    throw new Error(`SASL mechanism ${name} is not supported`);
  }
  return mechanism;
}
