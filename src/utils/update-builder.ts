/**
 * UpdateBuilder utility for building dynamic SQL UPDATE statements from a
 * partial domain object and a field -> column mapping.
 */

import type { SqlValue } from './db';

export interface FieldMapping<T> {
    key: keyof T;
    column: string;
    transform?: (value: unknown) => SqlValue;
}

function toSqlValue(value: unknown): SqlValue {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
        return value;
    }
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    return JSON.stringify(value);
}

export class UpdateBuilder<T> {
    private fields: string[] = [];
    private values: SqlValue[] = [];

    constructor(
        private updates: Partial<T>,
        private mappings: FieldMapping<T>[]
    ) {
        this.build();
    }

    private build(): void {
        for (const mapping of this.mappings) {
            const value = this.updates[mapping.key];
            if (value !== undefined) {
                this.fields.push(`${mapping.column} = ?`);
                this.values.push(mapping.transform ? mapping.transform(value) : toSqlValue(value));
            }
        }
    }

    addTimestamp(column: string, at: number = Date.now()): this {
        this.fields.push(`${column} = ?`);
        this.values.push(at);
        return this;
    }

    hasUpdates(): boolean {
        return this.fields.length > 0;
    }

    toSql(table: string, idColumn = 'id'): string {
        return `UPDATE ${table} SET ${this.fields.join(', ')} WHERE ${idColumn} = ?`;
    }

    getValues(id: string): SqlValue[] {
        return [...this.values, id];
    }
}
