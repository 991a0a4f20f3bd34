import cac from 'cac';
import { version } from '../package.json';
import { InMemoryStore } from './adapters/InMemoryStore';
import { buildSchemas, loadScenario, stepToKind, type Scenario } from './cli/scenario';
import { PatchBus } from './core/PatchBus';
import { SnapshotManager } from './core/SnapshotManager';
import type { NamespaceHandle } from './core/NamespaceHandle';
import { ConfigurationError, PatchBusError } from './errors';
import type { TerminalState } from './types';
import { resolveConfig } from './validation';

export interface ReplayOptions {
    snapshot?: boolean;
    debug?: boolean;
}

export interface CycleSummary {
    cycle: number;
    /** Null when nothing was admitted in this cycle. */
    transactionId: number | null;
    state: TerminalState | 'EMPTY';
    submitted: number;
    rejected: string[];
    applied: number;
    dropped: Record<string, number>;
    conflicts: number;
    errors: string[];
    applyError?: string;
}

export interface SnapshotSummary {
    id: string;
    version: number;
    entities: number;
    components: number;
    layers: number;
    assets: number;
}

export interface ReplaySummary {
    cycles: CycleSummary[];
    entities: number;
    version: number;
    snapshot?: SnapshotSummary;
}

/**
 * Runs a scenario through a bus backed by an `InMemoryStore`.
 */
export async function replay(scenario: Scenario, options: ReplayOptions = {}): Promise<ReplaySummary> {
    const store = new InMemoryStore();
    const config = resolveConfig({ ...scenario.config, debug: options.debug ?? false });
    const bus = new PatchBus(store, config);

    for (const [name, schema] of buildSchemas(scenario)) bus.registerSchema(name, schema);

    const handles = new Map<string, NamespaceHandle>();
    for (const ns of scenario.namespaces) {
        handles.set(ns.name, bus.register(ns.permissions ?? {}, ns.limits ?? {}, ns.name));
    }
    const snapshots = options.snapshot ? new SnapshotManager(bus, { name: '__snapshots' }) : null;

    const cycles: CycleSummary[] = [];
    for (const [index, cycle] of scenario.cycles.entries()) {
        const rejected: string[] = [];
        for (const step of cycle.patches) {
            const handle = handles.get(step.namespace);
            if (!handle) throw new ConfigurationError(`Cycle ${index + 1}: unknown namespace "${step.namespace}"`);
            const kind = stepToKind(step, handle.id, (name) => handles.get(name)?.id);
            try {
                handle.submit(handle.patch(kind, { priority: step.priority, timestamp: step.timestamp }));
            } catch (error) {
                if (!(error instanceof PatchBusError)) throw error;
                rejected.push(`${step.namespace} ${step.op}: ${error.message}`);
            }
        }
        for (const name of cycle.unregister ?? []) {
            const handle = handles.get(name);
            if (!handle) throw new ConfigurationError(`Cycle ${index + 1}: unknown namespace "${name}"`);
            bus.unregister(handle.id);
        }

        const result = await bus.runCycle();
        const summary: CycleSummary = {
            cycle: index + 1,
            transactionId: result ? result.id : null,
            state: result ? result.state : 'EMPTY',
            submitted: cycle.patches.length,
            rejected,
            applied: 0,
            dropped: {},
            conflicts: result ? result.conflicts.length : 0,
            errors: result ? result.errors.map((e) => e.message) : [],
        };
        for (const report of result ? result.reports : []) {
            if (report.outcome === 'applied') {
                summary.applied++;
            } else {
                summary.dropped[report.outcome] = (summary.dropped[report.outcome] ?? 0) + 1;
            }
        }
        if (result?.applyError) summary.applyError = result.applyError.message;
        cycles.push(summary);
    }

    const replaySummary: ReplaySummary = { cycles, entities: store.entityCount, version: store.currentVersion };
    if (snapshots) {
        const snapshot = await snapshots.capture();
        replaySummary.snapshot = {
            id: snapshot.id,
            version: snapshot.version,
            entities: snapshot.entities.length,
            components: snapshot.components.length,
            layers: snapshot.layers.length,
            assets: snapshot.assets.length,
        };
    }
    return replaySummary;
}

export function formatCycle(summary: CycleSummary): string {
    if (summary.transactionId === null) {
        return `cycle ${summary.cycle}: nothing to apply (${summary.rejected.length} rejected)`;
    }
    const dropped = Object.entries(summary.dropped).map(([outcome, count]) => `${outcome}=${count}`);
    const parts = [
        `cycle ${summary.cycle}: tx ${summary.transactionId} ${summary.state}`,
        `applied=${summary.applied}`,
        ...dropped,
        `rejected=${summary.rejected.length}`,
        `conflicts=${summary.conflicts}`,
    ];
    return parts.join(' ');
}

export function formatSummary(summary: ReplaySummary): string[] {
    const lines: string[] = [];
    for (const cycle of summary.cycles) {
        lines.push(formatCycle(cycle));
        for (const rejection of cycle.rejected) lines.push(`  rejected ${rejection}`);
        for (const error of cycle.errors) lines.push(`  invalid ${error}`);
        if (cycle.applyError) lines.push(`  store ${cycle.applyError}`);
    }
    lines.push(`store: version ${summary.version}, ${summary.entities} entities`);
    if (summary.snapshot) {
        const s = summary.snapshot;
        lines.push(
            `${s.id}: version ${s.version}, ${s.entities} entities, ${s.components} components, ` +
            `${s.layers} layers, ${s.assets} assets`
        );
    }
    return lines;
}

interface ReplayCommandOptions {
    json?: boolean;
    snapshot?: boolean;
    debug?: boolean;
}

export async function runReplay(file: string, options: ReplayCommandOptions): Promise<number> {
    try {
        const summary = await replay(loadScenario(file), { snapshot: options.snapshot, debug: options.debug });
        if (options.json) {
            console.log(JSON.stringify(summary, null, 2));
        } else {
            for (const line of formatSummary(summary)) console.log(line);
        }
        return summary.cycles.some((c) => c.state === 'ABORTED') ? 2 : 0;
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`❌ ${message}`);
        return 1;
    }
}

export function createCLI() {
    const cli = cac('patchbus');

    cli
        .command('replay <scenario>', 'Run a YAML or JSON scenario through a patch bus and report each cycle')
        .option('--json', 'Print the summary as JSON')
        .option('--snapshot', 'Capture a snapshot after the last cycle')
        .option('--debug', 'Log bus internals at debug level')
        .action(async (file: string, options: ReplayCommandOptions) => {
            process.exitCode = await runReplay(file, options);
        });

    cli.help();
    cli.version(version);
    return cli;
}
