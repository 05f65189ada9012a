/**
 * Ordered metadata store
 *
 * @module Metadata
 */

import type { Field, FieldValue } from "./field.ts";
import type { FieldRedaction } from "./redaction.ts";

/**
 * Query side of a {@link Metadata} store.
 */
export interface ReadonlyMetadata extends Iterable<[string, FieldValue]> {
    readonly size: number;
    isEmpty(): boolean;
    get(name: string): FieldValue | undefined;
    getField(name: string): Field | undefined;
    redaction(name: string): FieldRedaction | undefined;
    iter(): IterableIterator<[string, FieldValue]>;
    iterWithRedaction(): IterableIterator<[string, FieldValue, FieldRedaction]>;
    entries(): IterableIterator<Field>;
    /** Detached, writable copy */
    clone(): Metadata;
}

/**
 * Deterministic collection of {@link Field}s keyed by name.
 *
 * Iteration follows name order (code-unit order), never insertion order, so
 * two stores built from the same fields serialize identically. Redaction
 * policies are tracked per name independently of field presence: a policy
 * set before a field exists applies to it once it is inserted.
 */
export class Metadata implements ReadonlyMetadata {
    private readonly fields: Field[] = [];
    private readonly policies = new Map<string, FieldRedaction>();

    static fromFields(fields: Iterable<Field>): Metadata {
        const metadata = new Metadata();
        metadata.extend(fields);
        return metadata;
    }

    get size(): number {
        return this.fields.length;
    }

    isEmpty(): boolean {
        return this.fields.length === 0;
    }

    /**
     * Insert or replace a field.
     *
     * @returns The previous value stored under the same name, if any
     */
    insert(field: Field): FieldValue | undefined {
        const policy = this.policies.get(field.name);
        const next = policy === undefined ? field : field.withRedaction(policy);
        const { index, found } = this.search(field.name);
        if (found) {
            const previous = this.fields[index];
            this.fields[index] = next;
            return previous?.value;
        }
        this.fields.splice(index, 0, next);
        return undefined;
    }

    extend(fields: Iterable<Field>): void {
        for (const field of fields) {
            this.insert(field);
        }
    }

    get(name: string): FieldValue | undefined {
        return this.getField(name)?.value;
    }

    getField(name: string): Field | undefined {
        const { index, found } = this.search(name);
        return found ? this.fields[index] : undefined;
    }

    /**
     * Effective policy for a name: the stored field's policy when present,
     * otherwise a registered policy for fields not inserted yet.
     */
    redaction(name: string): FieldRedaction | undefined {
        return this.getField(name)?.redaction ?? this.policies.get(name);
    }

    /**
     * Register a policy for a name and apply it to the current field, if any.
     * Setting a policy for an absent field is not an error.
     */
    setRedaction(name: string, redaction: FieldRedaction): void {
        this.policies.set(name, redaction);
        const { index, found } = this.search(name);
        const current = found ? this.fields[index] : undefined;
        if (current) {
            this.fields[index] = current.withRedaction(redaction);
        }
    }

    *iter(): IterableIterator<[string, FieldValue]> {
        for (const field of this.fields) {
            yield [field.name, field.value];
        }
    }

    *iterWithRedaction(): IterableIterator<[string, FieldValue, FieldRedaction]> {
        for (const field of this.fields) {
            yield [field.name, field.value, field.redaction];
        }
    }

    /**
     * Fields in name order.
     */
    *entries(): IterableIterator<Field> {
        yield* this.fields;
    }

    [Symbol.iterator](): IterableIterator<[string, FieldValue]> {
        return this.iter();
    }

    /**
     * Copy with the same fields and registered policies.
     */
    clone(): Metadata {
        const copy = new Metadata();
        for (const [name, policy] of this.policies) {
            copy.policies.set(name, policy);
        }
        copy.fields.push(...this.fields);
        return copy;
    }

    private search(name: string): { index: number; found: boolean } {
        let low = 0;
        let high = this.fields.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            const candidate = this.fields[mid]?.name ?? "";
            if (candidate === name) return { index: mid, found: true };
            if (candidate < name) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        return { index: low, found: false };
    }
}
