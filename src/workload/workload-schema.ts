/**
 * @fileoverview Structural schema for workload descriptions.
 *
 * The schema checks shapes and required fields only. Rules that depend on
 * feature flags or span several containers (content conflicts, mount path
 * collisions, placeholder references) belong to the InputNormalizer.
 *
 * @module WorkloadSchema
 * @since 1.0.0
 */

import { posix } from "node:path";
import { z } from "zod";
import { WorkloadValidationError } from "../errors.ts";
import { ManifestUtils } from "../kubernetes/manifests/manifest-utils.ts";

const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9.]*[a-z0-9])?$/;
const ENV_NAME = /^[-._a-zA-Z][-._a-zA-Z0-9]*$/;
const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const IANA_SVC_NAME = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const SERVICE_PORT_NAME_MESSAGE = "port names must be IANA service names of at most 15 characters";
const OCTAL_MODE = /^0?[0-7]{3}$/;

const dnsLabel = (what: string) =>
  z.string().max(63, `${what} must be at most 63 characters`).regex(DNS_LABEL, `${what} must be a DNS-1123 label`);

const mountPath = z.string().startsWith("/", "mount paths must be absolute");

// The final segment becomes the Secret data key.
const filePath = mountPath.refine(
  (path) => ManifestUtils.validateDataKey(posix.basename(path)),
  "file paths must end in a name of letters, digits, '-', '_' or '.'",
);

const portName = z
  .string()
  .max(15, SERVICE_PORT_NAME_MESSAGE)
  .regex(IANA_SVC_NAME, SERVICE_PORT_NAME_MESSAGE)
  .refine((name) => /[a-z]/.test(name) && !name.includes("--"), SERVICE_PORT_NAME_MESSAGE);

const port = z.number().int().min(1).max(65535);

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const stringMap = z.record(z.string(), z.string());

export const httpGetSchema = z.object({
  path: z.string({ required_error: "path is required for httpGet probes" }).min(1),
  port: z.number({ required_error: "port is required for httpGet probes" }).int().min(1).max(65535),
  host: z.string().optional(),
  scheme: z.enum(["HTTP", "HTTPS"]).optional(),
  httpHeaders: z.array(z.object({ name: z.string().min(1), value: z.string() })).optional(),
});

export const execSchema = z.object({
  command: z.array(z.string()).min(1, "exec probes need at least one command element"),
});

export const probeSchema = z
  .object({
    httpGet: httpGetSchema.optional(),
    exec: execSchema.optional(),
  })
  .refine((probe) => (probe.httpGet === undefined) !== (probe.exec === undefined), {
    message: "probe must declare exactly one of httpGet or exec",
  });

const resourceQuantitiesSchema = z.object({
  cpu: z.string().optional(),
  memory: z.string().optional(),
});

export const resourcesSchema = z.object({
  limits: resourceQuantitiesSchema.optional(),
  requests: resourceQuantitiesSchema.optional(),
});

export const fileSchema = z
  .object({
    source: z.string().min(1).optional(),
    content: z.string().optional(),
    binaryContent: z.string().regex(BASE64, "binaryContent must be base64").optional(),
    mode: z.string().regex(OCTAL_MODE, "mode must be an octal string such as 0644").optional(),
    noExpand: z.boolean().optional(),
  })
  .refine(
    (file) => file.source !== undefined || file.content !== undefined || file.binaryContent !== undefined,
    { message: "file must declare one of source, content or binaryContent" },
  );

export const volumeSchema = z.object({
  source: z
    .string({ required_error: "source is required for volumes" })
    .regex(DNS_SUBDOMAIN, "source must be a valid persistent volume claim name"),
  path: z.string().optional(),
  readOnly: z.boolean().optional(),
});

export const containerSchema = z.object({
  image: z.string({ required_error: "image is required" }).min(1, "image is required"),
  command: z.array(z.string()).optional(),
  args: z.array(z.string()).optional(),
  variables: z.record(z.string().regex(ENV_NAME, "variable names must be valid environment names"), scalar).optional(),
  files: z.record(filePath, fileSchema).optional(),
  volumes: z.record(mountPath, volumeSchema).optional(),
  resources: resourcesSchema.optional(),
  livenessProbe: probeSchema.optional(),
  readinessProbe: probeSchema.optional(),
});

export const servicePortSchema = z.object({
  port,
  targetPort: port.optional(),
  protocol: z.enum(["TCP", "UDP", "SCTP"]).optional(),
});

export const serviceSchema = z.object({
  ports: z.record(portName, servicePortSchema).optional(),
});

export const workloadSchema = z.object({
  name: dnsLabel("name"),
  namespace: dnsLabel("namespace").optional(),
  annotations: stringMap.optional(),
  additionalAnnotations: stringMap.optional(),
  workloadType: z.string().optional(),
  serviceAccountName: z.string().min(1).optional(),
  waitForRollout: z.boolean().optional(),
  containers: z
    .record(dnsLabel("container keys"), containerSchema)
    .refine((containers) => Object.keys(containers).length > 0, {
      message: "at least one container is required",
    }),
  service: serviceSchema.optional(),
}).superRefine((workload, ctx) => {
  const declaresService = Object.keys(workload.service?.ports ?? {}).length > 0;
  if (declaresService && !/^[a-z]/.test(workload.name)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["name"],
      message: "name must start with a letter when a service is declared",
    });
  }
});

export type WorkloadInput = z.infer<typeof workloadSchema>;
export type ContainerInput = z.infer<typeof containerSchema>;
export type FileInput = z.infer<typeof fileSchema>;
export type VolumeInput = z.infer<typeof volumeSchema>;
export type ProbeInput = z.infer<typeof probeSchema>;
export type ServicePortInput = z.infer<typeof servicePortSchema>;

/**
 * Formats zod issues as `<dotted.path>: <message>` strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates a raw workload description.
 *
 * @throws {WorkloadValidationError} listing every structural problem found
 */
export function parseWorkload(raw: unknown): WorkloadInput {
  const result = workloadSchema.safeParse(raw);
  if (!result.success) {
    throw new WorkloadValidationError(formatIssues(result.error));
  }
  return result.data;
}
