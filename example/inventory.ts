import debug from 'debug';
import { z } from 'zod';
import { jsonResult, type ToolDefinition } from '../src/index.js';

const log = debug('inventory');

export const UNITS = ['PIECES', 'KG', 'LITERS', 'GRAMS'] as const;
export const CATEGORIES = ['DAIRY', 'VEGETABLES', 'FRUIT', 'MEAT', 'FISH', 'PRESERVES', 'DRINKS', 'OTHER'] as const;
export const LOCATIONS = ['FRIDGE', 'FREEZER', 'PANTRY', 'CELLAR'] as const;

export type Unit = (typeof UNITS)[number];
export type Category = (typeof CATEGORIES)[number];
export type Location = (typeof LOCATIONS)[number];

export interface NewItem {
    name: string;
    quantity: number;
    unit: Unit;
    category: Category;
    location: Location;
    /** YYYY-MM-DD */
    expiresOn?: string;
}

export interface InventoryItem extends NewItem {
    id: number;
    addedBy: string;
    createdAt: Date;
}

/**
 * In-memory pantry inventory, the store behind the example tools.
 */
export class InventoryStore {
    private items = new Map<number, InventoryItem>();
    private nextId = 1;
    private closed = false;

    constructor(seed: NewItem[] = [], seededBy: string = 'system') {
        seed.forEach((item) => this.add(item, seededBy));
    }

    add(item: NewItem, addedBy: string): InventoryItem {
        const record: InventoryItem = { ...item, id: this.nextId++, addedBy, createdAt: new Date() };
        this.items.set(record.id, record);
        log('%s added %s (%d)', addedBy, record.name, record.id);
        return record;
    }

    get(id: number): InventoryItem | undefined {
        return this.items.get(id);
    }

    /** Case-insensitive substring match on name, category and location, sorted by name. */
    search(query: string, limit: number = 10): InventoryItem[] {
        const needle = query.trim().toLowerCase();
        if (!needle) {
            return [];
        }
        return [...this.items.values()]
            .filter((item) =>
                [item.name, item.category, item.location].some((field) => field.toLowerCase().includes(needle)),
            )
            .sort((a, b) => a.name.localeCompare(b.name))
            .slice(0, limit);
    }

    /** Items expiring on or before `days` from `now`, already expired ones included, soonest first. */
    expiringWithin(days: number, now: Date = new Date()): InventoryItem[] {
        const cutoff = isoDate(new Date(now.getTime() + days * 24 * 60 * 60 * 1000));
        return [...this.items.values()]
            .filter((item): item is InventoryItem & { expiresOn: string } => !!item.expiresOn && item.expiresOn <= cutoff)
            .sort((a, b) => a.expiresOn.localeCompare(b.expiresOn));
    }

    /** Liveness probe for `/health`. */
    ping(): void {
        if (this.closed) {
            throw new Error('Inventory store is closed');
        }
    }

    close(): void {
        this.closed = true;
    }
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

export function itemId(item: InventoryItem): string {
    return `item-${item.id}`;
}

function itemTitle(item: InventoryItem): string {
    return `${item.name} (${item.quantity} ${item.unit})`;
}

function serialize(item: InventoryItem) {
    return {
        id: itemId(item),
        name: item.name,
        quantity: item.quantity,
        unit: item.unit,
        category: item.category,
        location: item.location,
        expiresOn: item.expiresOn ?? null,
        addedBy: item.addedBy,
        createdAt: item.createdAt.toISOString(),
    };
}

const SearchArgs = z.object({
    query: z.string(),
});

const FetchArgs = z.object({
    id: z.string().regex(/^item-\d+$/, "id must have the form 'item-<number>'"),
});

const AddItemArgs = z.object({
    name: z.string().trim().min(1, 'name is required'),
    quantity: z.number().positive(),
    unit: z.enum(UNITS),
    category: z.enum(CATEGORIES).default('OTHER'),
    location: z.enum(LOCATIONS),
    expiresOn: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/, 'expiresOn must be a date in YYYY-MM-DD format')
        .optional(),
});

const ListExpiringArgs = z.object({
    days: z.number().int().min(0).max(365).default(7),
});

export function createInventoryTools(store: InventoryStore): ToolDefinition[] {
    return [
        {
            name: 'search',
            title: 'Search inventory',
            description: 'Search pantry items by name, category or storage location',
            inputSchema: {
                type: 'object',
                properties: {
                    query: { type: 'string', description: 'Text to look for in item names, categories or locations' },
                },
                required: ['query'],
            },
            handler: (args) => {
                const { query } = SearchArgs.parse(args);
                const results = store.search(query).map((item) => ({ id: itemId(item), title: itemTitle(item) }));
                return jsonResult({ results });
            },
        },
        {
            name: 'fetch',
            title: 'Fetch item',
            description: 'Retrieve the complete details of a pantry item by id',
            inputSchema: {
                type: 'object',
                properties: {
                    id: { type: 'string', description: "Item id, in the form 'item-<number>'" },
                },
                required: ['id'],
            },
            handler: (args) => {
                const { id } = FetchArgs.parse(args);
                const item = store.get(Number(id.slice('item-'.length)));
                if (!item) {
                    throw new Error(`Item not found: ${id}`);
                }
                return jsonResult({
                    id,
                    title: itemTitle(item),
                    text: [
                        `Quantity: ${item.quantity} ${item.unit}`,
                        `Category: ${item.category}`,
                        `Location: ${item.location}`,
                        `Expires on: ${item.expiresOn ?? 'not set'}`,
                    ].join('\n'),
                    metadata: serialize(item),
                });
            },
        },
        {
            name: 'add_item',
            title: 'Add item',
            description: 'Add an item to the pantry inventory',
            inputSchema: {
                type: 'object',
                properties: {
                    name: { type: 'string' },
                    quantity: { type: 'number', exclusiveMinimum: 0 },
                    unit: { type: 'string', enum: [...UNITS] },
                    category: { type: 'string', enum: [...CATEGORIES], default: 'OTHER' },
                    location: { type: 'string', enum: [...LOCATIONS] },
                    expiresOn: { type: 'string', format: 'date', description: 'YYYY-MM-DD' },
                },
                required: ['name', 'quantity', 'unit', 'location'],
            },
            handler: (args, auth) => {
                const item = store.add(AddItemArgs.parse(args), auth.subject);
                return jsonResult({ success: true, item: serialize(item) });
            },
        },
        {
            name: 'list_expiring',
            title: 'List expiring items',
            description: 'List items expiring within the given number of days, soonest first',
            inputSchema: {
                type: 'object',
                properties: {
                    days: { type: 'integer', minimum: 0, maximum: 365, default: 7 },
                },
            },
            handler: (args) => {
                const { days } = ListExpiringArgs.parse(args);
                return jsonResult({ days, items: store.expiringWithin(days).map(serialize) });
            },
        },
    ];
}
