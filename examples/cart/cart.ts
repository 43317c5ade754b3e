import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import { createSessions, createSessionStoreFromConfig, loadConfig } from "../../satchel/index.js";

// The session key lives in a file here; a web app would carry it in a cookie.
const KEY_FILE = ".cart-session";

const Cart = z.object({ items: z.record(z.number().int().positive()) });
type Cart = z.infer<typeof Cart>;

const [command, item = ""] = process.argv.slice(2);
if (!command || ((command === "add" || command === "drop") && item === "")) {
  console.error("Usage: npm run example:cart -- <add|drop> <item> | show | clear");
  process.exit(1);
}

const store = await createSessionStoreFromConfig(
  loadConfig({ SATCHEL_LIBSQL_URL: "file:./cart.db", ...process.env }),
);
const sessions = createSessions({ store });
const previousKey = existsSync(KEY_FILE) ? readFileSync(KEY_FILE, "utf-8").trim() : null;

const { key, result, outcome } = await sessions.run(previousKey, (session) => {
  const cart: Cart = session.get("cart", Cart) ?? { items: {} };

  switch (command) {
    case "add":
      cart.items[item] = (cart.items[item] ?? 0) + 1;
      session.insert("cart", cart);
      break;
    case "drop":
      delete cart.items[item];
      session.insert("cart", cart);
      break;
    case "clear":
      session.destroy();
      return {};
  }
  return cart.items;
});

writeFileSync(KEY_FILE, key.toString());
console.log(JSON.stringify(result), `(${outcome})`);
