export type Byte = number; // 0..255
export type Word = number; // 0..65535

// Register that is waiting for FX0A to observe a keypress
export interface KeyWaitLatch {
  active: boolean;
  register: number;
}

export interface CPUState {
  v: Uint8Array; // V0..VF, VF doubles as carry/borrow/collision flag
  i: Word; // address register
  pc: Word; // program counter
  stack: Uint16Array; // return addresses
  sp: number; // current stack depth
  keyWait: KeyWaitLatch;
}
