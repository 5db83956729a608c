import { connect } from "node:net";

export type ReachabilityProbe = {
	isReachable(): Promise<boolean>;
};

export type TcpReachabilityOptions = {
	host?: string;
	port?: number;
	timeoutMs?: number;
};

export class TcpReachabilityProbe implements ReachabilityProbe {
	readonly #host: string;
	readonly #port: number;
	readonly #timeoutMs: number;

	constructor(options: TcpReachabilityOptions = {}) {
		this.#host = options.host ?? "8.8.8.8";
		this.#port = options.port ?? 53;
		this.#timeoutMs = options.timeoutMs ?? 5000;
	}

	isReachable(): Promise<boolean> {
		return new Promise((resolve) => {
			const socket = connect({ host: this.#host, port: this.#port });
			const finish = (reachable: boolean) => {
				socket.destroy();
				resolve(reachable);
			};

			socket.setTimeout(this.#timeoutMs);
			socket.once("connect", () => finish(true));
			socket.once("timeout", () => finish(false));
			socket.once("error", () => finish(false));
		});
	}
}
