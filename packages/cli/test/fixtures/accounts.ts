import { action, api, basePath, del, description, get, payload, post, resource, routing, title } from "@stagegen/eval";

api("bank", () => {
  title("Bank API");
  description("Accounts service");
});

resource("account", () => {
  basePath("/accounts");

  action("create", () => {
    description("Open an account");
    routing(post(""));
    payload();
  });

  action("list", () => {
    routing(get(""));
  });

  action("show", () => {
    routing(get("/:id"));
  });

  action("delete", () => {
    routing(del("/:id"));
  });
});
