import { isDisabledOperation } from '../operations/disabled.js'
import type { OperationSpec } from '../operations/types.js'
import { type PitConfig, loadConfig } from './config.js'

const operations: OperationSpec[] = []

export function registerOperation(spec: OperationSpec): void {
	if (isDisabledOperation(spec.name)) {
		throw new Error(`${spec.name} cannot be registered: it has no cutoff-safe implementation`)
	}
	// Prevent duplicate registration
	if (operations.some((op) => op.name === spec.name)) return
	operations.push(Object.freeze({ ...spec }))
}

export function getOperations(): OperationSpec[] {
	return [...operations]
}

export function getOperation(name: string): OperationSpec | undefined {
	return operations.find((op) => op.name === name)
}

/** Registered operations minus those switched off through `disabledTools`. */
export function getExposedOperations(config: PitConfig = loadConfig()): OperationSpec[] {
	const disabled = new Set(config.disabledTools ?? [])
	return operations.filter((op) => !disabled.has(op.name))
}
