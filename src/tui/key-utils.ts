export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/** Keys that close or leave an input; text buffers never consume them. */
export function isInputExitKey(name: string): boolean {
  return name === 'ESCAPE' || name === 'CTRL_C' || name === 'ENTER' || name === 'TAB';
}
