import { parentPort } from "node:worker_threads";
import { createRequestHandler } from "./handler";

const handle = createRequestHandler();
const port = parentPort;

if (port) {
  port.on("message", (data: unknown) => {
    port.postMessage(handle(data));
  });
}
