import type { MessageValue, RpcResult } from "@packline/rpc-protocol";

/**
 * A handler bound under a method name, with its userdata already applied.
 */
export type RegisteredMethod =
  | {
      kind: "call";
      invoke: (params: MessageValue, id: number) => RpcResult | Promise<RpcResult>;
    }
  | {
      kind: "notify";
      invoke: (params: MessageValue) => void | Promise<void>;
    };

/**
 * Method name to handler mapping. Registering a name again replaces the
 * previous binding, whatever its kind.
 */
export class MethodRegistry {
  private readonly methods = new Map<string, RegisteredMethod>();

  get size(): number {
    return this.methods.size;
  }

  register(name: string, method: RegisteredMethod): void {
    this.methods.set(name, method);
  }

  lookup(name: string): RegisteredMethod | undefined {
    return this.methods.get(name);
  }

  clear(): void {
    this.methods.clear();
  }
}
