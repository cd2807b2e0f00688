export class UserNotFoundError extends Error {
	constructor(public readonly username: string) {
		super(`User not found: ${username}`)
		this.name = "UserNotFoundError"
	}
}

/**
 * A request carried a value the service refuses, such as a malformed username.
 */
export class InvalidInputError extends Error {
	constructor(
		public readonly field: string,
		message: string,
	) {
		super(`${field}: ${message}`)
		this.name = "InvalidInputError"
	}
}

export class ConfigError extends Error {
	constructor(message: string) {
		super(`Invalid configuration: ${message}`)
		this.name = "ConfigError"
	}
}
