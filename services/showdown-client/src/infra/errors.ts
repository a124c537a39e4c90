export class BattleClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AuthenticationError extends BattleClientError {}

export class TimeoutError extends BattleClientError {}

export class ProtocolDecodeError extends BattleClientError {}

export class ConfigurationError extends BattleClientError {}

export class TransportError extends BattleClientError {}
