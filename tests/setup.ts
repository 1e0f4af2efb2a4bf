/**
 * Jest Setup File
 * Lets Jest print bigint amounts in failure messages
 */

declare global {
  interface BigInt {
    toJSON(): string;
  }
}

BigInt.prototype.toJSON = function (this: bigint): string {
  return this.toString();
};

export {};
