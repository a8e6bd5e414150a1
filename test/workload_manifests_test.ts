import assert from "node:assert/strict";
import { test } from "node:test";
import { ManifestUtils } from "../src/kubernetes/manifests/manifest-utils.ts";
import { SecretManifests } from "../src/kubernetes/manifests/secret-manifests.ts";
import { WorkloadManifests } from "../src/kubernetes/manifests/workload-manifests.ts";
import type { CompilerFeatures } from "../src/types/workload-types.ts";
import { InputNormalizer } from "../src/workload/input-normalizer.ts";
import { parseWorkload } from "../src/workload/workload-schema.ts";

const SELECTOR_ID = "0a1b2c3d4e5f6071";

function render(raw: unknown, features: Partial<CompilerFeatures> = {}) {
  const workload = new InputNormalizer({ features }).normalize(parseWorkload(raw));
  const secrets = new SecretManifests().materialize(workload);
  return new WorkloadManifests().generateWorkload(workload, {
    selectorId: SELECTOR_ID,
    checksum: "abc123",
    secrets,
  });
}

const shop = {
  name: "shop",
  namespace: "apps",
  annotations: { team: "core" },
  additionalAnnotations: { "prometheus.io/scrape": "true" },
  serviceAccountName: "shop-runner",
  containers: {
    web: {
      image: "nginx:1.27",
      variables: { FOO: "bar" },
      files: { "/etc/shop/app.conf": { content: "listen = 8080", mode: "0644" } },
      volumes: { "/data": { source: "shop-data" } },
      resources: { limits: { memory: "256Mi" } },
      livenessProbe: { httpGet: { path: "/healthz", port: 8080 } },
      readinessProbe: { exec: { command: ["true"] } },
    },
  },
};

test("WorkloadManifests - Deployment metadata and selector", () => {
  const manifest = render(shop);

  assert.equal(manifest.apiVersion, "apps/v1");
  assert.equal(manifest.kind, "Deployment");
  assert.deepEqual(manifest.metadata, {
    name: "shop",
    namespace: "apps",
    labels: {
      "app.kubernetes.io/name": "shop",
      "app.kubernetes.io/managed-by": "workload-compiler",
    },
    annotations: { team: "core" },
  });
  assert.deepEqual(manifest.spec.selector, {
    matchLabels: { "workload-compiler.dev/selector": SELECTOR_ID },
  });
});

test("WorkloadManifests - pod template labels and annotations", () => {
  const { metadata } = render(shop).spec.template;

  assert.deepEqual(metadata.labels, {
    "app.kubernetes.io/name": "shop",
    "app.kubernetes.io/managed-by": "workload-compiler",
    "workload-compiler.dev/selector": SELECTOR_ID,
  });
  assert.deepEqual(metadata.annotations, {
    "checksum/config": "abc123",
    "prometheus.io/scrape": "true",
    team: "core",
  });
  assert.deepEqual(Object.keys(metadata.annotations), ["checksum/config", "prometheus.io/scrape", "team"]);
});

test("WorkloadManifests - container wiring", () => {
  const { spec } = render(shop).spec.template;

  assert.deepEqual(spec.containers, [
    {
      name: "web",
      image: "nginx:1.27",
      envFrom: [{ secretRef: { name: "shop-web-env" } }],
      resources: { limits: { memory: "256Mi" } },
      livenessProbe: { httpGet: { path: "/healthz", port: 8080 } },
      readinessProbe: { exec: { command: ["true"] } },
      volumeMounts: [
        {
          name: `file-${ManifestUtils.shortHash("web:/etc/shop/app.conf")}`,
          mountPath: "/etc/shop/app.conf",
          subPath: "app.conf",
          readOnly: true,
        },
        {
          name: WorkloadManifests.claimVolumeName("shop-data"),
          mountPath: "/data",
          readOnly: false,
        },
      ],
      securityContext: {
        allowPrivilegeEscalation: false,
        readOnlyRootFilesystem: true,
      },
    },
  ]);
  assert.equal(spec.serviceAccountName, "shop-runner");
});

test("WorkloadManifests - secret volumes precede claim volumes", () => {
  const { spec } = render(shop).spec.template;

  assert.deepEqual(spec.volumes, [
    {
      name: `file-${ManifestUtils.shortHash("web:/etc/shop/app.conf")}`,
      secret: {
        secretName: SecretManifests.fileSecretName("shop", "web", "/etc/shop/app.conf"),
        defaultMode: 420,
      },
    },
    {
      name: `claim-${ManifestUtils.shortHash("shop-data")}`,
      persistentVolumeClaim: { claimName: "shop-data" },
    },
  ]);
});

test("WorkloadManifests - shared claims appear once", () => {
  const manifest = render({
    name: "cache",
    containers: {
      b: { image: "busybox", volumes: { "/b": { source: "shared" }, "/z": { source: "alpha" } } },
      a: { image: "busybox", volumes: { "/a": { source: "shared", path: "a", readOnly: true } } },
    },
  });
  const { spec } = manifest.spec.template;

  assert.deepEqual(spec.volumes, [
    { name: WorkloadManifests.claimVolumeName("alpha"), persistentVolumeClaim: { claimName: "alpha" } },
    { name: WorkloadManifests.claimVolumeName("shared"), persistentVolumeClaim: { claimName: "shared" } },
  ]);
  assert.deepEqual(spec.containers.map((container) => container.name), ["a", "b"]);
  assert.deepEqual(spec.containers[0].volumeMounts, [
    { name: WorkloadManifests.claimVolumeName("shared"), mountPath: "/a", subPath: "a", readOnly: true },
  ]);
});

test("WorkloadManifests - StatefulSet carries serviceName", () => {
  const manifest = render({
    name: "ledger",
    workloadType: "statefulset",
    containers: { db: { image: "postgres:16" } },
  });

  assert.ok(manifest.kind === "StatefulSet");
  assert.equal(manifest.spec.serviceName, "ledger");
  assert.equal(manifest.metadata.namespace, "default");
  assert.equal(manifest.metadata.annotations, undefined);
});

test("WorkloadManifests - minimal workload", () => {
  const { metadata, spec } = render({ name: "tiny", containers: { main: { image: "busybox" } } }).spec.template;

  assert.deepEqual(metadata.annotations, { "checksum/config": "abc123" });
  assert.equal(spec.volumes, undefined);
  assert.equal(spec.serviceAccountName, undefined);
  assert.deepEqual(spec.containers[0], {
    name: "main",
    image: "busybox",
    securityContext: { allowPrivilegeEscalation: false, readOnlyRootFilesystem: true },
  });
});

test("WorkloadManifests - pod security context is always set", () => {
  const hardened = render({ name: "tiny", containers: { main: { image: "busybox" } } });
  const relaxed = render({ name: "tiny", containers: { main: { image: "busybox" } } }, { hardenContainers: false });

  const podSecurity = { runAsNonRoot: true, seccompProfile: { type: "RuntimeDefault" } };
  assert.deepEqual(hardened.spec.template.spec.securityContext, podSecurity);
  assert.deepEqual(relaxed.spec.template.spec.securityContext, podSecurity);
  assert.equal(relaxed.spec.template.spec.containers[0].securityContext, undefined);
});

test("WorkloadManifests - command, args and httpGet options", () => {
  const manifest = render({
    name: "api",
    containers: {
      app: {
        image: "api:1",
        command: ["/bin/api"],
        args: ["--port", "8080"],
        livenessProbe: {
          httpGet: {
            path: "/healthz",
            port: 8080,
            scheme: "HTTPS",
            httpHeaders: [{ name: "X-Probe", value: "1" }],
          },
        },
      },
    },
  });
  const [container] = manifest.spec.template.spec.containers;

  assert.deepEqual(container.command, ["/bin/api"]);
  assert.deepEqual(container.args, ["--port", "8080"]);
  assert.deepEqual(container.livenessProbe, {
    httpGet: {
      path: "/healthz",
      port: 8080,
      scheme: "HTTPS",
      httpHeaders: [{ name: "X-Probe", value: "1" }],
    },
  });
});
