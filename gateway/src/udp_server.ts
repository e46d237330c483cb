import dgram from "node:dgram";
import type { AddressInfo } from "node:net";
import type { QueryEngine } from "./engine.js";
import type { Logger } from "./log.js";

export type UdpServerConfig = {
  host: string;
  port: number;
  engine: QueryEngine;
  logger: Logger;
  socketType?: dgram.SocketType;
};

export type UdpServer = {
  start(): Promise<AddressInfo>;
  stop(): Promise<void>;
  inFlight(): number;
};

export function createUdpServer(cfg: UdpServerConfig): UdpServer {
  const log = cfg.logger;
  const socket = dgram.createSocket(cfg.socketType ?? "udp4");
  let bound = false;
  let pending = 0;

  function send(wire: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.send(wire, rinfo.port, rinfo.address, (err) => (err ? reject(err) : resolve()));
    });
  }

  // one task per datagram; responses go out in completion order
  async function dispatch(msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    pending += 1;
    try {
      const response = await cfg.engine.resolve(msg, rinfo.address);
      if (response) await send(response, rinfo);
    } finally {
      pending -= 1;
    }
  }

  socket.on("message", (msg, rinfo) => {
    dispatch(msg, rinfo).catch((err) => log.error(`query from ${rinfo.address}:${rinfo.port} failed`, err));
  });

  function start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        socket.off("listening", onListening);
        reject(err);
      };
      const onListening = () => {
        socket.off("error", onError);
        bound = true;
        socket.on("error", (err) => log.error("udp socket error", err));
        const addr = socket.address();
        log.info(`listening on udp://${addr.address}:${addr.port}`);
        resolve(addr);
      };
      socket.once("error", onError);
      socket.once("listening", onListening);
      socket.bind(cfg.port, cfg.host);
    });
  }

  function stop(): Promise<void> {
    return new Promise((resolve) => {
      if (!bound) return resolve();
      bound = false;
      socket.close(() => resolve());
    });
  }

  return { start, stop, inFlight: () => pending };
}
