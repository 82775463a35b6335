import test from "node:test";
import assert from "node:assert/strict";
import {
  Router,
  RouteError,
  applyPrefix,
  compilePattern,
  createApp,
  extractPath,
} from "../src/index.js";

const noop = () => "ok";

test("placeholders compile to anchored single-segment named groups", () => {
  const pattern = compilePattern("/users/{id}/posts/{post_id}");

  assert.equal(pattern.source, "^/users/(?<id>[^/]+)/posts/(?<post_id>[^/]+)$");
  assert.deepEqual(pattern.paramNames, ["id", "post_id"]);
});

test("compiling the same path twice yields the same pattern", () => {
  const first = compilePattern("/files/{name}.json");
  const second = compilePattern("/files/{name}.json");

  assert.equal(first.source, second.source);
  assert.deepEqual(first.paramNames, second.paramNames);
  assert.equal(first.source, "^/files/(?<name>[^/]+)\\.json$");
});

test("literal text is escaped by default and verbatim when escaping is disabled", () => {
  const escaped = compilePattern("/a.b");
  assert.equal(escaped.regex.test("/a.b"), true);
  assert.equal(escaped.regex.test("/aXb"), false);

  const raw = compilePattern("/a.b", { escapeLiterals: false });
  assert.equal(raw.source, "^/a.b$");
  assert.equal(raw.regex.test("/aXb"), true);
});

test("tokens that are not valid placeholders stay literal", () => {
  const pattern = compilePattern("/x/{1abc}/{}");

  assert.deepEqual(pattern.paramNames, []);
  assert.equal(pattern.regex.test("/x/{1abc}/{}"), true);
  assert.equal(pattern.regex.test("/x/value/{}"), false);
});

test("paths that cannot compile raise RouteError", () => {
  assert.throws(() => compilePattern("/{id}/{id}"), RouteError);
  assert.throws(() => compilePattern("/a(b", { escapeLiterals: false }), (error: unknown) => {
    assert.ok(error instanceof RouteError);
    assert.equal(error.path, "/a(b");
    assert.equal(error.code, "INVALID_ROUTE");
    return true;
  });
});

test("prefixes are joined in order and the result is made absolute", () => {
  assert.equal(applyPrefix([], ""), "/");
  assert.equal(applyPrefix([], "users"), "/users");
  assert.equal(applyPrefix(["api"], "/users"), "/api/users");
  assert.equal(applyPrefix(["/a", "/b"], "/c"), "/a/b/c");
  assert.equal(applyPrefix(["/admin"], ""), "/admin");
});

test("path extraction drops query string and fragment", () => {
  assert.equal(extractPath("/users/42?tab=posts#top"), "/users/42");
  assert.equal(extractPath("/users/42#top"), "/users/42");
  assert.equal(extractPath("http://localhost:3000/a/b?q=1"), "/a/b");
  assert.equal(extractPath(""), "");
});

test("nested groups compose prefixes in nesting order", () => {
  const router = new Router();

  router.group("/a", (r) => {
    r.group("/b", (inner) => {
      inner.get("/c", noop);
    });
    r.post("/d", noop);
  });

  const routes = router.getRoutes();
  assert.equal(routes.GET[0]?.originalPath, "/a/b/c");
  assert.equal(routes.POST[0]?.originalPath, "/a/d");
});

test("group prefix without a leading slash still yields an absolute path", () => {
  const router = new Router();
  router.group("api", (r) => r.get("/status", noop));

  assert.equal(router.getRoutes().GET[0]?.originalPath, "/api/status");
});

test("group prefix is removed even when the group body throws", () => {
  const router = new Router();

  assert.throws(
    () =>
      router.group("/admin", (r) => {
        r.get("/inside", noop);
        throw new Error("boom");
      }),
    /boom/
  );
  router.get("/after", noop);

  const paths = router.getRoutes().GET.map((route) => route.originalPath);
  assert.deepEqual(paths, ["/admin/inside", "/after"]);
});

test("any registers an independent route under every method", () => {
  const router = new Router();
  router.any("/health", noop);

  const routes = router.getRoutes();
  for (const method of ["GET", "POST", "PUT", "PATCH", "DELETE"] as const) {
    assert.equal(routes[method].length, 1);
    assert.equal(routes[method][0]?.method, method);
    assert.equal(routes[method][0]?.originalPath, "/health");
  }
  assert.notEqual(routes.GET[0], routes.POST[0]);
  assert.notEqual(routes.GET[0]?.pattern, routes.DELETE[0]?.pattern);
});

test("registering the same path twice keeps both routes in order", () => {
  const router = new Router();
  const first = () => "first";
  const second = () => "second";

  router.get("/dup", first).get("/dup", second);

  const routes = router.getRoutes().GET;
  assert.equal(routes.length, 2);
  assert.equal(routes[0]?.handler, first);
  assert.equal(routes[1]?.handler, second);
});

test("getRoutes returns a frozen-entry snapshot", () => {
  const router = new Router();
  router.get("/one", noop);

  const snapshot = router.getRoutes();
  router.get("/two", noop);

  assert.equal(snapshot.GET.length, 1);
  assert.equal(router.getRoutes().GET.length, 2);
  assert.equal(Object.isFrozen(snapshot.GET[0]), true);
});

test("compiled patterns of registered routes cannot be replaced", () => {
  const router = new Router();
  router.get("/users/{id}", noop);

  const route = router.getRoutes().GET[0];
  assert.ok(route);
  assert.equal(Object.isFrozen(route.pattern), true);
  assert.equal(Object.isFrozen(route.pattern.paramNames), true);
  assert.equal(Reflect.set(route.pattern, "regex", /^\/anything$/), false);

  assert.equal(router.match({ method: "GET", path: "/users/1" }).matched, true);
  assert.equal(router.match({ method: "GET", path: "/anything" }).matched, false);
});

test("invalid override field configuration is rejected", () => {
  assert.throws(() => createApp({ overrideField: "" }));
});
