import assert from "node:assert/strict";
import { test } from "node:test";
import { ErrorCodes, WorkloadValidationError } from "../src/errors.ts";
import { parseWorkload } from "../src/workload/workload-schema.ts";

function issuesOf(raw: unknown): string[] {
  try {
    parseWorkload(raw);
  } catch (err) {
    assert.ok(err instanceof WorkloadValidationError);
    assert.equal(err.code, ErrorCodes.VALIDATION_FAILED);
    return err.issues;
  }
  assert.fail("expected parseWorkload to throw");
}

function withContainer(container: Record<string, unknown>): Record<string, unknown> {
  return { name: "app", containers: { web: container } };
}

test("WorkloadSchema - accepts a minimal workload", () => {
  const input = parseWorkload(withContainer({ image: "nginx" }));
  assert.equal(input.name, "app");
  assert.equal(input.containers.web.image, "nginx");
  assert.equal(input.namespace, undefined);
});

test("WorkloadSchema - converts scalar variables to strings", () => {
  const input = parseWorkload(withContainer({ image: "nginx", variables: { PORT: 8080, DEBUG: true, NAME: "x" } }));
  assert.deepEqual(input.containers.web.variables, { PORT: "8080", DEBUG: "true", NAME: "x" });
});

test("WorkloadSchema - image is required", () => {
  assert.deepEqual(issuesOf(withContainer({})), ["containers.web.image: image is required"]);
});

test("WorkloadSchema - at least one container is required", () => {
  assert.deepEqual(issuesOf({ name: "app", containers: {} }), ["containers: at least one container is required"]);
});

test("WorkloadSchema - names must be DNS labels", () => {
  const issues = issuesOf({ name: "Web_App", containers: { web: { image: "nginx" } } });
  assert.deepEqual(issues, ["name: name must be a DNS-1123 label"]);
});

test("WorkloadSchema - probes need exactly one of httpGet or exec", () => {
  const both = issuesOf(withContainer({
    image: "nginx",
    livenessProbe: { httpGet: { path: "/", port: 80 }, exec: { command: ["true"] } },
  }));
  assert.deepEqual(both, ["containers.web.livenessProbe: probe must declare exactly one of httpGet or exec"]);

  const neither = issuesOf(withContainer({ image: "nginx", readinessProbe: {} }));
  assert.deepEqual(neither, ["containers.web.readinessProbe: probe must declare exactly one of httpGet or exec"]);
});

test("WorkloadSchema - httpGet probes require path and port", () => {
  const missingPath = issuesOf(withContainer({ image: "nginx", livenessProbe: { httpGet: { port: 80 } } }));
  assert.ok(missingPath.includes("containers.web.livenessProbe.httpGet.path: path is required for httpGet probes"));

  const missingPort = issuesOf(withContainer({ image: "nginx", livenessProbe: { httpGet: { path: "/" } } }));
  assert.ok(missingPort.includes("containers.web.livenessProbe.httpGet.port: port is required for httpGet probes"));
});

test("WorkloadSchema - files need some content and an absolute path", () => {
  const empty = issuesOf(withContainer({ image: "nginx", files: { "/etc/x": { mode: "0644" } } }));
  assert.deepEqual(empty, ["containers.web.files./etc/x: file must declare one of source, content or binaryContent"]);

  const relative = issuesOf(withContainer({ image: "nginx", files: { "etc/x": { content: "x" } } }));
  assert.equal(relative.length, 1);
  assert.ok(relative[0].endsWith("mount paths must be absolute"));
});

test("WorkloadSchema - rejects malformed modes and volume sources", () => {
  const mode = issuesOf(withContainer({ image: "nginx", files: { "/etc/x": { content: "x", mode: "rw" } } }));
  assert.deepEqual(mode, ["containers.web.files./etc/x.mode: mode must be an octal string such as 0644"]);

  const volume = issuesOf(withContainer({ image: "nginx", volumes: { "/data": {} } }));
  assert.deepEqual(volume, ["containers.web.volumes./data.source: source is required for volumes"]);
});

test("WorkloadSchema - reports every problem at once", () => {
  const issues = issuesOf({ name: "app", containers: { web: {}, api: {} } });
  assert.deepEqual(issues.sort(), ["containers.api.image: image is required", "containers.web.image: image is required"]);
});

test("WorkloadSchema - file paths must end in a valid Secret key", () => {
  const message = "file paths must end in a name of letters, digits, '-', '_' or '.'";

  assert.deepEqual(
    issuesOf(withContainer({ image: "nginx", files: { "/": { content: "x" } } })),
    [`containers.web.files./: ${message}`],
  );
  assert.deepEqual(
    issuesOf(withContainer({ image: "nginx", files: { "/etc/my file.txt": { content: "x" } } })),
    [`containers.web.files./etc/my file.txt: ${message}`],
  );
  assert.doesNotThrow(() => parseWorkload(withContainer({ image: "nginx", files: { "/etc/app_v1.conf": { content: "x" } } })));
});

test("WorkloadSchema - service port names follow IANA service name rules", () => {
  const withPort = (name: string) => ({
    name: "app",
    containers: { web: { image: "nginx" } },
    service: { ports: { [name]: { port: 80 } } },
  });

  assert.deepEqual(issuesOf(withPort("a-very-long-port-name")), [
    "service.ports.a-very-long-port-name: port names must be IANA service names of at most 15 characters",
  ]);
  assert.deepEqual(issuesOf(withPort("8080")), [
    "service.ports.8080: port names must be IANA service names of at most 15 characters",
  ]);
  assert.deepEqual(issuesOf(withPort("http--alt")), [
    "service.ports.http--alt: port names must be IANA service names of at most 15 characters",
  ]);
  assert.doesNotThrow(() => parseWorkload(withPort("http-alt")));
});

test("WorkloadSchema - a Service needs a name starting with a letter", () => {
  assert.deepEqual(
    issuesOf({ name: "1app", containers: { web: { image: "nginx" } }, service: { ports: { http: { port: 80 } } } }),
    ["name: name must start with a letter when a service is declared"],
  );
  assert.doesNotThrow(() => parseWorkload({ name: "1app", containers: { web: { image: "nginx" } } }));
});

test("WorkloadSchema - binaryContent must be padded base64", () => {
  assert.deepEqual(
    issuesOf(withContainer({ image: "nginx", files: { "/etc/seed.bin": { binaryContent: "abc" } } })),
    ["containers.web.files./etc/seed.bin.binaryContent: binaryContent must be base64"],
  );
  assert.doesNotThrow(() => parseWorkload(withContainer({ image: "nginx", files: { "/etc/seed.bin": { binaryContent: "AAECAwQ=" } } })));
});
