import path from "node:path";

export function resolveDataRoot(): string {
  return process.env.TASKGATE_DATA_ROOT
    ? path.resolve(process.env.TASKGATE_DATA_ROOT)
    : path.join(process.cwd(), "data");
}
