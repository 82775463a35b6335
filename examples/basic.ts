import { HttpError, controller, createApp, createControllerRegistry } from "../src/index.js";

class PostController {
  show(id: string) {
    return { id, title: `Post ${id}` };
  }

  destroy(id: string) {
    return { deleted: id };
  }
}

const app = createApp({
  controllers: createControllerRegistry({ PostController }),
  hooks: {
    onResponse: ({ method, effectiveMethod, path, response, durationMs }) => {
      const via = method === effectiveMethod ? "" : ` (as ${effectiveMethod})`;
      console.log(`${method}${via} ${path} -> ${response.status} in ${durationMs}ms`);
    },
    onError: ({ path, error }) => {
      console.error(`Error handling ${path}:`, error);
    },
  },
});

app.get("/", () => ({ name: "switchyard", status: "ok" }));

app.group("/api", (api) => {
  api.group("/posts", (posts) => {
    posts.get("/{id}", controller(PostController, "show"));
    // HTML forms reach this with POST + _method=DELETE
    posts.delete("/{id}", ["PostController", "destroy"]);
  });

  api.get("/users/{id}", (id) => {
    if (id === "0") {
      throw new HttpError(404, "User not found", { code: "USER_NOT_FOUND" });
    }
    return { id };
  });

  api.any("/echo/{word}", (word) => word);
});

const requests = [
  new Request("http://localhost/"),
  new Request("http://localhost/api/posts/7"),
  new Request("http://localhost/api/posts/7", {
    method: "POST",
    headers: { "content-type": "application/x-www-form-urlencoded" },
    body: "_method=DELETE",
  }),
  new Request("http://localhost/api/users/0"),
  new Request("http://localhost/api/echo/hello", { method: "PATCH" }),
  new Request("http://localhost/nowhere"),
];

for (const request of requests) {
  const response = await app.fetch(request);
  console.log(await response.text());
}
