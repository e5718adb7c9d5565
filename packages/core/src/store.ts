/**
 * In-memory route store.
 *
 * This module provides the {@link RouteStore}, which turns route definitions
 * into frozen {@link Model}s and answers per-request lookups, and the
 * {@link StoreHandle}, which swaps whole stores on reload.
 *
 * @packageDocumentation
 */

import { DuplicateRouteError, MissingResultsFieldError } from './errors.js';
import { matchPattern, normalizeRouteKey } from './route-key.js';
import type {
    Configuration,
    HttpMethod,
    JsonValue,
    MatchedModel,
    Model,
    ModelResponse,
    RouteDefinition,
} from './types.js';

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Compares a field value with a path parameter by string representation, so
 * `2` matches `'2'`. Objects and arrays never match.
 */
function fieldMatches(value: JsonValue | undefined, expected: string): boolean {
    switch (typeof value) {
        case 'string':
            return value === expected;
        case 'number':
        case 'bigint':
        case 'boolean':
            return String(value) === expected;
        default:
            return false;
    }
}

/**
 * Builds a frozen model from a route definition.
 *
 * The response body is cloned so the model never shares state with the
 * configuration it came from.
 *
 * @param key - Route key as written in the configuration
 * @param route - Resolved route definition
 */
export function createModel(key: string, route: RouteDefinition): Model {
    const { method, pattern, identifier } = normalizeRouteKey(key, route.method);

    const model: Model = {
        identifier,
        method,
        pattern,
        headers: { ...route.headers },
        idField: route.idField,
        status: route.response.status,
        data: structuredClone(route.response.body),
        description: route.description,
        resultsField: route.resultsField,
    };

    return deepFreeze(model);
}

/**
 * Read-only index of models, keyed by canonical route identifier.
 *
 * A store is built complete by {@link RouteStore.populate} and never changes
 * afterwards; reloading means building a new store.
 *
 * @example
 * ```typescript
 * const store = RouteStore.fromConfiguration(config);
 *
 * const match = store.findMatching('GET', '/api/users/2');
 * if (match) {
 *     const response = store.resolveResponse(match);
 * }
 * ```
 */
export class RouteStore {
    private readonly models: readonly Model[];
    private readonly byIdentifier: ReadonlyMap<string, Model>;
    private readonly byMethod: ReadonlyMap<HttpMethod, readonly Model[]>;

    private constructor(models: Model[]) {
        const byIdentifier = new Map<string, Model>();
        const byMethod = new Map<HttpMethod, Model[]>();

        for (const model of models) {
            byIdentifier.set(model.identifier, model);
            const existing = byMethod.get(model.method) || [];
            existing.push(model);
            byMethod.set(model.method, existing);
        }

        this.models = Object.freeze(models);
        this.byIdentifier = byIdentifier;
        this.byMethod = byMethod;
    }

    /**
     * Creates a store with no routes.
     */
    static empty(): RouteStore {
        return new RouteStore([]);
    }

    /**
     * Builds a store from route definitions.
     *
     * Either every route is indexed or the call throws and no store exists.
     *
     * @param routes - Route definitions keyed by route key, or key/definition pairs
     * @throws \{DuplicateRouteError\} When two keys normalize to the same route
     * @throws \{InvalidRouteError\} When a key cannot be normalized
     */
    static populate(
        routes:
            | Record<string, RouteDefinition>
            | Array<readonly [string, RouteDefinition]>,
    ): RouteStore {
        const entries: Array<readonly [string, RouteDefinition]> =
            Array.isArray(routes) ? routes : Object.entries(routes);
        const models: Model[] = [];
        const seen = new Set<string>();

        for (const [key, route] of entries) {
            const model = createModel(key, route);
            if (seen.has(model.identifier)) {
                throw new DuplicateRouteError(model.identifier);
            }
            seen.add(model.identifier);
            models.push(model);
        }

        return new RouteStore(models);
    }

    /**
     * Builds a store from a loaded configuration's routes.
     */
    static fromConfiguration(config: Configuration): RouteStore {
        return RouteStore.populate(config.routes);
    }

    /**
     * Gets a model by its canonical identifier, e.g. `[GET] /api/users/:id`.
     */
    getModel(identifier: string): Model | undefined {
        return this.byIdentifier.get(identifier);
    }

    /**
     * Gets all models in configuration order.
     */
    getModels(): readonly Model[] {
        return this.models;
    }

    /**
     * Gets the total number of models.
     */
    get count(): number {
        return this.models.length;
    }

    /**
     * Finds the model whose pattern matches a concrete request path.
     *
     * Among matching patterns, the one with more literal segments before its
     * first parameter wins; equal ones resolve to the first declared.
     *
     * @param method - HTTP method of the request
     * @param path - URL path of the request
     * @returns Matched model with bound parameters, or `undefined`
     *
     * @example
     * ```typescript
     * // With '/api/users/:id' and '/api/users/active' both declared:
     * store.findMatching('GET', '/api/users/active')?.model.identifier;
     * // '[GET] /api/users/active'
     * ```
     */
    findMatching(method: HttpMethod, path: string): MatchedModel | undefined {
        const candidates = this.byMethod.get(method);
        if (!candidates) return undefined;

        let best: MatchedModel | undefined;
        for (const model of candidates) {
            const params = matchPattern(model.pattern, path);
            if (!params) continue;
            if (
                !best ||
                model.pattern.leadingLiterals >
                    best.model.pattern.leadingLiterals
            ) {
                best = { model, params };
            }
        }

        return best;
    }

    /**
     * Gets the collection a model's records are searched in: its data, or the
     * array under its results field.
     *
     * @throws \{MissingResultsFieldError\} When the results field is absent
     * or does not hold an array
     */
    getCollection(model: Model): JsonValue {
        if (model.resultsField === undefined) {
            return model.data;
        }

        const collection = isJsonObject(model.data)
            ? model.data[model.resultsField]
            : undefined;
        if (!Array.isArray(collection)) {
            throw new MissingResultsFieldError(
                model.identifier,
                model.resultsField,
            );
        }
        return collection;
    }

    /**
     * Finds the record a bound path parameter points at.
     *
     * The parameter is compared against the record field of the same name,
     * which is the model's `idField` for an identifier parameter. Values are
     * compared by string representation. A single-object collection is
     * returned only if its own field matches.
     *
     * @param model - Model to search
     * @param paramName - Name of the bound parameter
     * @param paramValue - Value taken from the request path
     * @returns The record, or `undefined` when none matches
     * @throws \{MissingResultsFieldError\} See {@link RouteStore.getCollection}
     */
    resolveRecord(
        model: Model,
        paramName: string,
        paramValue: string,
    ): JsonValue | undefined {
        const collection = this.getCollection(model);

        if (Array.isArray(collection)) {
            return collection.find(
                (item) =>
                    isJsonObject(item) && fieldMatches(item[paramName], paramValue),
            );
        }
        if (
            isJsonObject(collection) &&
            fieldMatches(collection[paramName], paramValue)
        ) {
            return collection;
        }
        return undefined;
    }

    /**
     * Resolves the response for a match.
     *
     * Without parameters the model's full data is returned. Otherwise the
     * `idField` parameter is used when bound, else the last parameter.
     *
     * @returns Status and body, or `undefined` when no record matches
     */
    resolveResponse(match: MatchedModel): ModelResponse | undefined {
        const { model, params } = match;
        const names = Object.keys(params);

        if (names.length === 0) {
            return { status: model.status, body: model.data };
        }

        const name = Object.hasOwn(params, model.idField)
            ? model.idField
            : names[names.length - 1];
        const record = this.resolveRecord(model, name, params[name]);
        if (record === undefined) return undefined;

        return { status: model.status, body: record };
    }
}

/**
 * Owns the current {@link RouteStore} and replaces it as a whole.
 *
 * Readers call {@link StoreHandle.current} once per request and keep that
 * store for the rest of the request.
 */
export class StoreHandle {
    private store: RouteStore;

    constructor(initial: RouteStore = RouteStore.empty()) {
        this.store = initial;
    }

    /**
     * The store readers should query.
     */
    get current(): RouteStore {
        return this.store;
    }

    /**
     * Replaces the current store.
     *
     * @returns The store that was replaced
     */
    swap(next: RouteStore): RouteStore {
        const previous = this.store;
        this.store = next;
        return previous;
    }

    /**
     * Builds a replacement store and swaps it in once it is complete.
     *
     * If `build` throws, the current store stays in place and the error
     * propagates.
     *
     * @param build - Produces the complete new store
     * @returns The new store
     */
    async reload(build: () => Promise<RouteStore>): Promise<RouteStore> {
        const next = await build();
        this.swap(next);
        return next;
    }
}
