// ntlm-client ships no type definitions and has no @types package
declare module "ntlm-client" {
  export interface Type2Message {
    flags: number;
    encoding: "ascii" | "ucs2";
    version: number;
    challenge: Buffer;
    targetName: string;
    targetInfo: unknown;
  }

  export function createType1Message(workstation?: string, target?: string): string;
  export function decodeType2Message(header: string): Type2Message;
  export function createType3Message(
    type2Message: Type2Message,
    username: string,
    password: string,
    workstation?: string,
    target?: string
  ): string;
}
