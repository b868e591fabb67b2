export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}

	if (typeof error === 'string') {
		return error;
	}

	if (error === null || error === undefined) {
		return 'Unknown error';
	}

	try {
		return JSON.stringify(error);
	} catch {
		return String(error);
	}
}
