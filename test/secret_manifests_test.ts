import assert from "node:assert/strict";
import { test } from "node:test";
import { ManifestUtils } from "../src/kubernetes/manifests/manifest-utils.ts";
import { SecretManifests } from "../src/kubernetes/manifests/secret-manifests.ts";
import { InputNormalizer } from "../src/workload/input-normalizer.ts";
import { parseWorkload } from "../src/workload/workload-schema.ts";

function normalize(raw: unknown) {
  return new InputNormalizer().normalize(parseWorkload(raw));
}

test("SecretManifests - env secret per container with variables", () => {
  const workload = normalize({
    name: "app",
    namespace: "prod",
    containers: {
      web: { image: "nginx", variables: { FOO: "bar", BAZ: "qux" } },
      empty: { image: "busybox", variables: {} },
      none: { image: "busybox" },
    },
  });

  const secrets = new SecretManifests().materialize(workload);
  assert.equal(secrets.length, 1);
  assert.deepEqual(secrets[0], {
    type: "env",
    id: "env-web",
    name: "app-web-env",
    containerKey: "web",
    textData: { FOO: "bar", BAZ: "qux" },
    binaryData: {},
  });
});

test("SecretManifests - one single-key secret per inline file", () => {
  const workload = normalize({
    name: "app",
    namespace: "prod",
    containers: {
      web: {
        image: "nginx",
        files: {
          "/etc/app/config.yaml": { content: "debug: true\n", mode: "0644" },
          "/etc/app/seed.bin": { binaryContent: "AAECAwQ=" },
          "/etc/app/remote.conf": { source: "remote.conf" },
        },
      },
    },
  });

  const secrets = new SecretManifests().materialize(workload);
  const configHash = ManifestUtils.shortHash("/etc/app/config.yaml");
  const seedHash = ManifestUtils.shortHash("/etc/app/seed.bin");

  assert.equal(secrets.length, 2);
  const config = secrets.find((secret) => secret.id === `file-web-${configHash}`);
  assert.deepEqual(config, {
    type: "file",
    id: `file-web-${configHash}`,
    name: `app-web-${configHash}`,
    containerKey: "web",
    textData: { "config.yaml": "debug: true\n" },
    binaryData: {},
    mountPath: "/etc/app/config.yaml",
    dataKey: "config.yaml",
    volumeName: `file-${ManifestUtils.shortHash("web:/etc/app/config.yaml")}`,
    mode: 420,
  });

  const seed = secrets.find((secret) => secret.id === `file-web-${seedHash}`);
  assert.ok(seed);
  assert.deepEqual(seed.textData, {});
  assert.deepEqual(seed.binaryData, { "seed.bin": "AAECAwQ=" });
});

test("SecretManifests - secrets are ordered by composite key", () => {
  const workload = normalize({
    name: "app",
    containers: {
      web: { image: "nginx", variables: { A: "1" }, files: { "/etc/web.conf": { content: "w" } } },
      api: { image: "nginx", variables: { B: "2" }, files: { "/etc/api.conf": { content: "a" } } },
    },
  });

  const ids = new SecretManifests().materialize(workload).map((secret) => secret.id);
  assert.deepEqual(ids, [
    "env-api",
    "env-web",
    `file-api-${ManifestUtils.shortHash("/etc/api.conf")}`,
    `file-web-${ManifestUtils.shortHash("/etc/web.conf")}`,
  ]);
});

test("SecretManifests - names are deterministic", () => {
  assert.equal(SecretManifests.envSecretName("app", "web"), "app-web-env");
  assert.equal(
    SecretManifests.fileSecretName("app", "web", "/etc/a/b"),
    `app-web-${ManifestUtils.shortHash("/etc/a/b")}`,
  );
  assert.notEqual(
    SecretManifests.fileSecretName("app", "web", "/etc/a-b"),
    SecretManifests.fileSecretName("app", "web", "/etc/a/b"),
  );
});

test("SecretManifests - rendering base64 encodes text data only", () => {
  const workload = normalize({
    name: "app",
    namespace: "prod",
    containers: {
      web: {
        image: "nginx",
        variables: { FOO: "bar" },
        files: { "/etc/seed.bin": { binaryContent: "AAECAwQ=" } },
      },
    },
  });
  const generator = new SecretManifests();
  const [env, file] = generator.materialize(workload).map((secret) => generator.generateSecret(workload, secret));

  assert.deepEqual(env, {
    apiVersion: "v1",
    kind: "Secret",
    metadata: {
      name: "app-web-env",
      namespace: "prod",
      labels: { "app.kubernetes.io/name": "app", "app.kubernetes.io/managed-by": "workload-compiler" },
    },
    type: "Opaque",
    data: { FOO: "YmFy" },
  });
  assert.deepEqual(file.data, { "seed.bin": "AAECAwQ=" });
});
