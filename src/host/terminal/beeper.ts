export interface BellOutput {
  write(chunk: string): boolean
}

const BEL = '\x07'

// Rings the terminal bell once each time the sound timer becomes active
export class Beeper {
  private active = false
  private rings = 0

  constructor(private readonly out: BellOutput) {}

  update(soundActive: boolean): void {
    if (soundActive && !this.active) {
      this.out.write(BEL)
      this.rings++
    }
    this.active = soundActive
  }

  isBeeping(): boolean { return this.active }
  getRingCount(): number { return this.rings }
}
