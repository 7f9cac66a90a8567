import { ConfigurationError } from "../core/errors.js";
import type { AdapterKind, ToolAdapter } from "./backends/types.js";
import { LocalProcessRunner } from "./backends/localProcess.js";
import { InSilicoAdapter } from "./inSilico.js";

const ADAPTER_KINDS: readonly AdapterKind[] = ["local_process", "in_silico"];

function isAdapterKind(value: string): value is AdapterKind {
  return ADAPTER_KINDS.some((k) => k === value);
}

export function resolveAdapterKind(requested: string | undefined): AdapterKind {
  if (!requested) return "local_process";
  const kind = requested.trim().toLowerCase();
  if (!isAdapterKind(kind)) {
    throw new ConfigurationError(`unknown adapter "${requested}" (expected one of ${ADAPTER_KINDS.join(", ")})`);
  }
  return kind;
}

export function createAdapter(kind: AdapterKind): ToolAdapter {
  switch (kind) {
    case "local_process":
      return new LocalProcessRunner();
    case "in_silico":
      return new InSilicoAdapter();
  }
}
