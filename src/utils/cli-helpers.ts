import inquirer from "inquirer";
import { stringify as yamlStringify } from "yaml";
import type { WorkloadOutputs } from "../kubernetes/manifest-generator.ts";
import type { WorkloadKind } from "../types/workload-types.ts";

export interface StarterAnswers {
  name: string;
  namespace: string;
  image: string;
  workloadType: WorkloadKind;
  port?: number;
  healthPath?: string;
}

/**
 * Build a starter workload description from `init` answers.
 */
export function buildStarterWorkload(answers: StarterAnswers): Record<string, unknown> {
  const container: Record<string, unknown> = {
    image: answers.image,
    resources: {
      requests: { cpu: "100m", memory: "128Mi" },
      limits: { memory: "256Mi" },
    },
  };

  if (answers.port !== undefined && answers.healthPath) {
    const { healthPath, port } = answers;
    container.livenessProbe = { httpGet: { path: healthPath, port } };
    container.readinessProbe = { httpGet: { path: healthPath, port } };
  }

  const workload: Record<string, unknown> = {
    name: answers.name,
    namespace: answers.namespace,
    workloadType: answers.workloadType,
    containers: { [answers.name]: container },
  };

  if (answers.port !== undefined) {
    workload.service = { ports: { http: { port: answers.port } } };
  }

  return workload;
}

export function starterWorkloadYaml(answers: StarterAnswers): string {
  return yamlStringify(buildStarterWorkload(answers), { indent: 2 });
}

/**
 * Render workload outputs as `key = value` lines, skipping absent values.
 */
export function formatOutputs(outputs: WorkloadOutputs): string {
  return Object.entries(outputs)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key} = ${String(value)}`)
    .join("\n");
}

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

function validateLabel(input: string): boolean | string {
  return DNS_LABEL.test(input) && input.length <= 63 ? true : "Use lowercase letters, digits and '-' (max 63)";
}

/**
 * Ask for the fields of a starter workload.
 */
export async function promptStarterAnswers(): Promise<StarterAnswers> {
  const answers = await inquirer.prompt<{
    name: string;
    namespace: string;
    image: string;
    workloadType: WorkloadKind;
    port: string;
    healthPath: string;
  }>([
    { type: "input", name: "name", message: "Workload name:", validate: validateLabel },
    { type: "input", name: "namespace", message: "Namespace:", default: "default", validate: validateLabel },
    { type: "input", name: "image", message: "Container image:", validate: (input: string) => input.trim() !== "" || "Image is required" },
    { type: "list", name: "workloadType", message: "Workload type:", choices: ["Deployment", "StatefulSet"] },
    {
      type: "input",
      name: "port",
      message: "Service port (leave empty for none):",
      validate: (input: string) => input === "" || /^\d+$/.test(input) || "Enter a port number",
    },
    { type: "input", name: "healthPath", message: "HTTP health check path (leave empty for none):" },
  ]);

  return {
    name: answers.name,
    namespace: answers.namespace,
    image: answers.image.trim(),
    workloadType: answers.workloadType,
    ...(answers.port !== "" && { port: Number(answers.port) }),
    ...(answers.healthPath !== "" && { healthPath: answers.healthPath }),
  };
}
