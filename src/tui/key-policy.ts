export function shouldAllowGlobalQuit(params: { editing: boolean; filtering: boolean; sorting: boolean }): boolean {
  // While a text input or the sort menu is open, printable keys belong to it.
  if (params.editing) return false;
  if (params.filtering) return false;
  if (params.sorting) return false;
  return true;
}
