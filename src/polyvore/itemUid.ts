export const POLYVORE_NAMESPACE = 'polyvore';

/** `<namespace>:<set_id>_<index>`, the join key shared by every Polyvore manifest. */
export function composeItemUid(setId: string, index: string | number, namespace = POLYVORE_NAMESPACE): string {
  return `${namespace}:${setId}_${index}`;
}

export function composeOutfitUid(setId: string, namespace = POLYVORE_NAMESPACE): string {
  return `${namespace}:${setId}`;
}
