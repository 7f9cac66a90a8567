import { CancelledError, TopologyError } from "../core/errors.js";
import { Stream, Value, type Channel } from "./channel.js";

export type FlowNodeKind = "source" | "operator" | "task" | "sink";

export interface FlowNodeInfo {
  id: number;
  kind: FlowNodeKind;
  name: string;
  inputs: string[];
  outputs: string[];
  skipped: boolean;
}

export interface FlowEdge {
  from: string;
  to: string;
  channel: string;
}

interface NodeBody {
  info: FlowNodeInfo;
  outputs: Array<Channel<unknown>>;
  body: () => Promise<void>;
}

function reserve(taken: Set<string>, base: string): string {
  if (!taken.has(base)) {
    taken.add(base);
    return base;
  }
  for (let i = 2; ; i++) {
    const candidate = `${base}#${i}`;
    if (!taken.has(candidate)) {
      taken.add(candidate);
      return candidate;
    }
  }
}

/**
 * Graph under construction plus the runtime that drives it.
 *
 * Nodes are declared eagerly (so the topology can be inspected before anything
 * runs) and their bodies start only when `run()` is called.
 */
export class Flow {
  private readonly infos: FlowNodeInfo[] = [];
  private readonly bodies: NodeBody[] = [];
  private readonly channelNames = new Set<string>();
  private readonly nodeNames = new Set<string>();
  private readonly abortController = new AbortController();
  private rootFailure: { error: unknown } | null = null;
  private started = false;

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get nodes(): readonly FlowNodeInfo[] {
    return this.infos;
  }

  /** Unique channel name; repeated names get a numeric suffix. */
  channelName(base: string): string {
    return reserve(this.channelNames, base);
  }

  /** Unique node name, reserved before the node subscribes to its inputs. */
  nodeName(base: string): string {
    return reserve(this.nodeNames, base);
  }

  stream<T>(name: string, producer: string): Stream<T> {
    return new Stream<T>(this, this.channelName(name), producer);
  }

  value<T>(name: string, producer: string): Value<T> {
    return new Value<T>(this.channelName(name), producer);
  }

  /** Registers a node. The body runs once `run()` starts; declared outputs are closed when it returns. */
  declare(
    spec: { kind: FlowNodeKind; name: string; inputs: Array<Channel<unknown>>; outputs: Array<Channel<unknown>> },
    body: () => Promise<void>
  ): FlowNodeInfo {
    if (this.started) throw new TopologyError(`cannot declare node ${spec.name} after the flow started`, spec.name);
    const info: FlowNodeInfo = {
      id: this.infos.length,
      kind: spec.kind,
      name: spec.name,
      inputs: spec.inputs.map((c) => c.name),
      outputs: spec.outputs.map((c) => c.name),
      skipped: false
    };
    this.infos.push(info);
    this.bodies.push({ info, outputs: spec.outputs, body });
    return info;
  }

  /** Records a node whose `when` predicate is false; it has no body and produces nothing. */
  declareSkipped(kind: FlowNodeKind, name: string): FlowNodeInfo {
    if (this.started) throw new TopologyError(`cannot declare node ${name} after the flow started`, name);
    const info: FlowNodeInfo = { id: this.infos.length, kind, name, inputs: [], outputs: [], skipped: true };
    this.infos.push(info);
    return info;
  }

  edges(): FlowEdge[] {
    const producers = new Map<string, string>();
    for (const n of this.infos) for (const c of n.outputs) producers.set(c, n.name);
    const out: FlowEdge[] = [];
    for (const n of this.infos) {
      for (const c of n.inputs) {
        const from = producers.get(c);
        if (from) out.push({ from, to: n.name, channel: c });
      }
    }
    return out;
  }

  cancel(reason: unknown): void {
    if (!this.rootFailure) this.rootFailure = { error: reason };
    if (!this.abortController.signal.aborted) this.abortController.abort(reason);
  }

  /** Runs every declared node to completion and rethrows the first failure. */
  async run(): Promise<void> {
    if (this.started) throw new TopologyError("flow already started");
    this.started = true;

    const settled = await Promise.allSettled(this.bodies.map((b) => this.runBody(b)));

    if (this.rootFailure) throw this.rootFailure.error;
    for (const s of settled) {
      if (s.status === "rejected") throw s.reason;
    }
  }

  private async runBody(node: NodeBody): Promise<void> {
    try {
      await node.body();
      for (const out of node.outputs) {
        if (out instanceof Stream) out.close();
        else if (!out.isSettled) {
          out.fail(new TopologyError(`node ${node.info.name} finished without producing ${out.name}`, node.info.name));
        }
      }
    } catch (err) {
      for (const out of node.outputs) out.fail(err);
      if (!(err instanceof CancelledError)) this.cancel(err);
      throw err;
    }
  }
}
