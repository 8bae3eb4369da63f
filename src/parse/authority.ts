import { HEXDIG, IPV_FUTURE_LAST_PART, REG_NAME_NOT_PCT_ENCODED, USER_INFO_NOT_PCT_ENCODED } from '../charset/sets.js';
import { decodeComponent, illegalCharacter, invalidPercentEncoding } from '../decode/decodeComponent.js';
import { PercentEncodedCharacterDecoder } from '../decode/PercentEncodedCharacterDecoder.js';
import { ErrorCode, UriComponent } from '../types/enums.js';
import { UriParseError } from '../types/error.js';
import type { Authority } from '../types/uri.js';
import { asciiFold } from '../utils/asciiFold.js';
import { parsePort } from './port.js';

export enum HostState {
  START = 'START',
  REG_NAME = 'REG_NAME',
  REG_NAME_PERCENT = 'REG_NAME_PERCENT',
  IP_LITERAL = 'IP_LITERAL',
  IP_V6 = 'IP_V6',
  IP_VFUTURE_VERSION = 'IP_VFUTURE_VERSION',
  IP_VFUTURE_ADDRESS = 'IP_VFUTURE_ADDRESS',
  IP_LITERAL_END = 'IP_LITERAL_END',
  PORT = 'PORT'
}

interface HostMachine {
  readonly text: string;
  state: HostState;
  host: string;
  portString: string;
  decoder: PercentEncodedCharacterDecoder | null;
}

type Transition = (machine: HostMachine, c: string) => void;

function malformedLiteral(machine: HostMachine, reason: string): UriParseError {
  return new UriParseError(
    ErrorCode.INVALID_IP_LITERAL,
    UriComponent.HOST,
    `Malformed IP literal in ${JSON.stringify(machine.text)}: ${reason}`
  );
}

const TRANSITIONS: Record<HostState, Transition> = {
  [HostState.START]: (machine, c) => {
    if (c === '[') {
      machine.host += c;
      machine.state = HostState.IP_LITERAL;
      return;
    }
    machine.state = HostState.REG_NAME;
    TRANSITIONS[HostState.REG_NAME](machine, c);
  },

  [HostState.REG_NAME]: (machine, c) => {
    if (c === '%') {
      machine.decoder = new PercentEncodedCharacterDecoder();
      machine.state = HostState.REG_NAME_PERCENT;
    } else if (c === ':') {
      machine.state = HostState.PORT;
    } else if (REG_NAME_NOT_PCT_ENCODED.contains(c)) {
      machine.host += asciiFold(c);
    } else {
      throw illegalCharacter(UriComponent.HOST, c, machine.text);
    }
  },

  [HostState.REG_NAME_PERCENT]: (machine, c) => {
    const decoder = machine.decoder;
    if (!decoder || !decoder.nextEncodedCharacter(c)) {
      throw invalidPercentEncoding(UriComponent.HOST, machine.text);
    }
    if (decoder.isDone()) {
      machine.host += asciiFold(String.fromCharCode(decoder.decodedCharacter()));
      machine.decoder = null;
      machine.state = HostState.REG_NAME;
    }
  },

  [HostState.IP_LITERAL]: (machine, c) => {
    if (c === 'v') {
      machine.host += c;
      machine.state = HostState.IP_VFUTURE_VERSION;
      return;
    }
    machine.state = HostState.IP_V6;
    TRANSITIONS[HostState.IP_V6](machine, c);
  },

  // IPv6 contents are taken as-is up to the closing bracket.
  [HostState.IP_V6]: (machine, c) => {
    machine.host += c;
    if (c === ']') {
      machine.state = HostState.IP_LITERAL_END;
    }
  },

  [HostState.IP_VFUTURE_VERSION]: (machine, c) => {
    if (c === '.') {
      machine.state = HostState.IP_VFUTURE_ADDRESS;
    } else if (!HEXDIG.contains(c)) {
      throw malformedLiteral(machine, `unexpected ${JSON.stringify(c)} in version`);
    }
    machine.host += c;
  },

  [HostState.IP_VFUTURE_ADDRESS]: (machine, c) => {
    if (c === ']') {
      machine.state = HostState.IP_LITERAL_END;
    } else if (!IPV_FUTURE_LAST_PART.contains(c)) {
      throw malformedLiteral(machine, `unexpected ${JSON.stringify(c)} in address`);
    }
    machine.host += c;
  },

  [HostState.IP_LITERAL_END]: (machine, c) => {
    if (c !== ':') {
      throw malformedLiteral(machine, `unexpected ${JSON.stringify(c)} after "]"`);
    }
    machine.state = HostState.PORT;
  },

  [HostState.PORT]: (machine, c) => {
    machine.portString += c;
  }
};

function finish(machine: HostMachine): void {
  switch (machine.state) {
    case HostState.REG_NAME_PERCENT:
      throw invalidPercentEncoding(UriComponent.HOST, machine.text);
    case HostState.IP_LITERAL:
    case HostState.IP_V6:
    case HostState.IP_VFUTURE_VERSION:
    case HostState.IP_VFUTURE_ADDRESS:
      throw malformedLiteral(machine, 'missing "]"');
    default:
      break;
  }
}

export function parseHostPort(hostPort: string): Omit<Authority, 'userInfo'> {
  const machine: HostMachine = {
    text: hostPort,
    state: HostState.START,
    host: '',
    portString: '',
    decoder: null
  };
  for (const c of hostPort) {
    TRANSITIONS[machine.state](machine, c);
  }
  finish(machine);
  if (machine.portString.length === 0) {
    return { host: machine.host, hasPort: false, port: 0 };
  }
  return { host: machine.host, hasPort: true, port: parsePort(machine.portString) };
}

export function parseAuthority(authorityString: string): Authority {
  const userInfoEnd = authorityString.indexOf('@');
  if (userInfoEnd === -1) {
    return { userInfo: '', ...parseHostPort(authorityString) };
  }
  const userInfo = decodeComponent(
    authorityString.slice(0, userInfoEnd),
    USER_INFO_NOT_PCT_ENCODED,
    UriComponent.USER_INFO
  );
  return { userInfo, ...parseHostPort(authorityString.slice(userInfoEnd + 1)) };
}
