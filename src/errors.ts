/**
 * Bridge errors
 */

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

export class InverterHttpError extends Error {
	constructor(
		public readonly url: string,
		public readonly status: number,
		statusText: string
	) {
		super(`Inverter responded with HTTP ${status} ${statusText}: ${url}`);
		this.name = 'InverterHttpError';
	}
}

/**
 * The data-logger stick could not be reached at all. The stick turns its
 * Wi-Fi module off when the inverter goes dark, so this is routine at night.
 */
export class InverterUnavailableError extends Error {
	constructor(
		public readonly url: string,
		public readonly kind: string,
		cause: unknown
	) {
		super(`Inverter not reachable (${kind}): ${url}`, { cause });
		this.name = 'InverterUnavailableError';
	}
}

export class InverterResponseError extends Error {
	constructor(message: string, public readonly body: string) {
		super(message);
		this.name = 'InverterResponseError';
	}
}

export class DiscoveryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'DiscoveryError';
	}
}

export class MqttNotConnectedError extends Error {
	constructor(topic: string) {
		super(`MQTT not connected - cannot publish to ${topic}`);
		this.name = 'MqttNotConnectedError';
	}
}

export class MqttPublishTimeoutError extends Error {
	constructor(topic: string, timeoutMs: number) {
		super(`MQTT publish timeout after ${timeoutMs}ms: ${topic}`);
		this.name = 'MqttPublishTimeoutError';
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
