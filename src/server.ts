import http from "node:http";

import { plain, withParams } from "./payload";
import type { Responder } from "./response";

/**
 * Sample routes showing one response format each. `/busy` carries an error
 * that only shows up in `trace.desc` when debug output is allowed.
 */
export function createDemoServer(responder: Responder): http.Server {
  return http.createServer((req, res) => {
    const pathName = new URL(req.url ?? "/", "http://localhost").pathname;

    switch (pathName) {
      case "/busy":
        responder.xml(req, res, -1, plain("busy"), new Error("busy... "));
        return;
      case "/ok":
        responder.json(req, res, 0, plain("success"));
        return;
      case "/fail":
        responder.jsonp(req, res, 500, plain("fail"));
        return;
      case "/params":
        responder.yaml(req, res, 400, plain("params"));
        return;
      case "/test":
        responder.json(req, res, 1000, withParams(["Seakee", "18888888888"], "test"));
        return;
      default:
        res.writeHead(404, { "content-type": "text/plain; charset=utf-8" });
        res.end("Not Found");
    }
  });
}
