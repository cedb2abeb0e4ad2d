/**
 * Network error classification utilities
 * Used to tell an unreachable data-logger stick apart from other failures
 */

function causeCode(error: Error): string | undefined {
	const cause = error.cause;
	if (cause && typeof cause === 'object' && 'code' in cause) {
		return typeof cause.code === 'string' ? cause.code : undefined;
	}
	return undefined;
}

/**
 * DNS resolution errors
 */
export function isDnsError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const code = causeCode(error);
	if (code === 'ENOTFOUND' || code === 'EAI_AGAIN') {
		return true;
	}

	const msg = error.message.toLowerCase();
	return msg.includes('getaddrinfo') &&
	       (msg.includes('enotfound') || msg.includes('eai_again'));
}

/**
 * Connection refused (stick web server down)
 */
export function isConnectionRefused(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (causeCode(error) === 'ECONNREFUSED') {
		return true;
	}

	return error.message.toLowerCase().includes('econnrefused');
}

/**
 * Timeout errors, including fetch aborted by AbortSignal.timeout()
 */
export function isTimeout(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (error.name === 'TimeoutError' || error.name === 'AbortError') {
		return true;
	}

	const code = causeCode(error);
	if (code === 'ETIMEDOUT' || code === 'ECONNRESET' || code === 'UND_ERR_CONNECT_TIMEOUT') {
		return true;
	}

	return error.message.toLowerCase().includes('timeout');
}

/**
 * Network unreachable (stick Wi-Fi switched off)
 */
export function isNetworkUnreachable(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const code = causeCode(error);
	if (code === 'ENETUNREACH' || code === 'EHOSTUNREACH' || code === 'EHOSTDOWN') {
		return true;
	}

	const msg = error.message.toLowerCase();
	return msg.includes('network unreachable') || msg.includes('host unreachable');
}

/**
 * Get human-readable error type
 */
export function getNetworkErrorType(error: unknown): string {
	if (isDnsError(error)) return 'DNS_ERROR';
	if (isConnectionRefused(error)) return 'CONNECTION_REFUSED';
	if (isTimeout(error)) return 'TIMEOUT';
	if (isNetworkUnreachable(error)) return 'NETWORK_UNREACHABLE';
	return 'UNKNOWN';
}
