import { SignalNotFoundError } from "@signalboard/core"
import { afterEach, beforeEach, describe, expect, test } from "vitest"

import type { Db } from "../db.ts"

import { IN_MEMORY, openDatabase } from "../db.ts"
import { InvalidInputError, UserNotFoundError } from "../lib/error.ts"
import { SubscriptionService, normalizeUsername } from "./service.ts"
import { SubscriptionStore } from "./store.ts"

const REGISTERED = new Set(["board-health", "dog-walk"])

let db: Db
let service: SubscriptionService

beforeEach(async () => {
	db = await openDatabase(IN_MEMORY)
	const store = new SubscriptionStore(db)
	store.initSchema()
	service = new SubscriptionService(store, REGISTERED)
})

afterEach(() => {
	db.close()
})

describe("SubscriptionService", () => {
	test("createUser trims the username", () => {
		expect(service.createUser("  alice ")).toEqual({ username: "alice", created: true })
		expect(service.createUser("alice")).toEqual({ username: "alice", created: false })
		expect(service.listUsers().map((u) => u.username)).toEqual(["alice"])
	})

	test("subscribe returns the updated list", () => {
		service.createUser("alice")

		service.subscribe("alice", "dog-walk")
		const change = service.subscribe("alice", " board-health ")

		expect(change).toEqual({
			username: "alice",
			signalId: "board-health",
			changed: true,
			signals: ["board-health", "dog-walk"],
		})
	})

	test("subscribe rejects unregistered signals", () => {
		service.createUser("alice")

		expect(() => service.subscribe("alice", "nope")).toThrow(SignalNotFoundError)
		expect(service.listSubscriptions("alice")).toEqual([])
	})

	test("subscribe rejects a blank signal id", () => {
		service.createUser("alice")

		expect(() => service.subscribe("alice", "  ")).toThrow("signalId: must not be empty")
	})

	test("operations on unknown users throw UserNotFoundError", () => {
		expect(() => service.listSubscriptions("ghost")).toThrow(UserNotFoundError)
		expect(() => service.subscribe("ghost", "dog-walk")).toThrow(UserNotFoundError)
		expect(() => service.unsubscribe("ghost", "dog-walk")).toThrow(UserNotFoundError)
		expect(() => service.deleteUser("ghost")).toThrow("User not found: ghost")
	})

	test("unsubscribe works for signals that are no longer registered", () => {
		service.createUser("alice")
		const registry = new Set(["retired"])
		const store = new SubscriptionStore(db)
		new SubscriptionService(store, registry).subscribe("alice", "retired")

		const change = service.unsubscribe("alice", "retired")

		expect(change).toEqual({ username: "alice", signalId: "retired", changed: true, signals: [] })
	})

	test("deleteUser removes the user", () => {
		service.createUser("alice")

		service.deleteUser("alice")

		expect(service.listUsers()).toEqual([])
	})
})

describe("normalizeUsername", () => {
	test.each([
		["", "username: must not be empty"],
		["   ", "username: must not be empty"],
		["al ice", "username: must not contain whitespace"],
		["a".repeat(65), "username: must be at most 64 characters"],
	])("rejects %j", (input, message) => {
		expect(() => normalizeUsername(input)).toThrow(InvalidInputError)
		expect(() => normalizeUsername(input)).toThrow(message)
	})

	test("accepts 64 characters", () => {
		expect(normalizeUsername("a".repeat(64))).toBe("a".repeat(64))
	})
})
