import { ConfigurationError } from "../errors";
import { createLogger } from "../utils/logging";

export interface CredentialState {
    index: number;
    exhausted: boolean;
}

const logger = createLogger("Credentials.Rotator");

/**
 * Round-robin pointer over credential indices `0..size-1`. Exhausted
 * credentials stay exhausted for the lifetime of the instance.
 *
 * Calls are synchronous, so a single event loop never interleaves them. A
 * pool shared between concurrent workers has to keep select-then-attempt in
 * one critical section or two tasks can spend the same quota.
 */
export class CredentialRotator {
    readonly size: number;
    private pointer = 0;
    private readonly exhausted = new Set<number>();

    constructor(size: number) {
        if (!Number.isInteger(size) || size < 1) {
            throw new ConfigurationError(
                "at least one API key is required",
            );
        }
        this.size = size;
    }

    get current(): number {
        return this.pointer;
    }

    get exhaustedCount(): number {
        return this.exhausted.size;
    }

    get activeCount(): number {
        return this.size - this.exhausted.size;
    }

    isExhausted(index: number): boolean {
        return this.exhausted.has(index);
    }

    /** Index of the next active credential, or null once every one is exhausted. */
    nextAvailable(): number | null {
        if (this.exhausted.size >= this.size) return null;

        for (let step = 0; step < this.size; step++) {
            if (!this.exhausted.has(this.pointer)) {
                return this.pointer;
            }
            this.pointer = (this.pointer + 1) % this.size;
        }

        return null;
    }

    advance(): void {
        const from = this.pointer;
        this.pointer = (this.pointer + 1) % this.size;
        logger.info("credential_rotated", {
            from: from + 1,
            to: this.pointer + 1,
            active: this.activeCount,
            total: this.size,
        });
    }

    markExhausted(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.size) {
            throw new RangeError(
                `Credential index ${index} is outside pool of ${this.size}`,
            );
        }
        if (this.exhausted.has(index)) return;

        this.exhausted.add(index);
        logger.warn("credential_exhausted", {
            credential: index + 1,
            remaining: this.activeCount,
            total: this.size,
        });
    }

    states(): CredentialState[] {
        return Array.from({ length: this.size }, (_, index) => ({
            index,
            exhausted: this.exhausted.has(index),
        }));
    }
}
