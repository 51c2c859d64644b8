/**
 * Reusable output storage for in-place application.
 */

import { KindMismatchError, ShapeMismatchError } from './errors'
import { type Item, isPointSet, isRaster, many } from './items'
import { allocateLike } from './resample'

/** An item of identical kind and shape backed by fresh storage. */
export function makeBuffer<I extends Item>(item: I): I
export function makeBuffer(item: Item): Item {
  if (isRaster(item)) return { ...item, data: allocateLike(item.data, item.data.length) }
  if (isPointSet(item)) return { ...item, data: new Float64Array(item.data.length) }
  if (item.kind === 'many') return many(item.items.map((i) => makeBuffer(i)))
  return item
}

function kindPath(path: string, kind: string): string {
  return path === '' ? kind : `${path} > ${kind}`
}

/** Throw unless `buffer` can hold `item` exactly. Writes nothing. */
export function checkShapes(buffer: Item, item: Item, path = ''): void {
  const where = kindPath(path, item.kind)
  if (buffer.kind !== item.kind) {
    throw new KindMismatchError(item.kind, buffer.kind, where)
  }
  if (buffer.kind === 'many' && item.kind === 'many') {
    if (buffer.items.length !== item.items.length) {
      throw new ShapeMismatchError([item.items.length], [buffer.items.length], `${where} item count`)
    }
    item.items.forEach((sub, i) => checkShapes(buffer.items[i], sub, `${where}[${i}]`))
    return
  }
  if ((isRaster(buffer) || isPointSet(buffer)) && (isRaster(item) || isPointSet(item))) {
    if (buffer.data.length !== item.data.length) {
      throw new ShapeMismatchError([item.data.length], [buffer.data.length], `${where} data length`)
    }
  }
}

/**
 * Copy the data of `item` into `buffer`'s storage and return the buffer
 * relabelled with the item's bounds. Shapes are checked across the whole
 * tree before anything is written.
 */
export function copyItemData<I extends Item>(buffer: I, item: I): I
export function copyItemData(buffer: Item, item: Item): Item {
  checkShapes(buffer, item)
  return writeItem(buffer, item)
}

function writeItem(buffer: Item, item: Item): Item {
  if (isRaster(buffer) && isRaster(item)) {
    buffer.data.set(item.data)
    return { ...item, data: buffer.data }
  }
  if (isPointSet(buffer) && isPointSet(item)) {
    buffer.data.set(item.data)
    return { ...item, data: buffer.data }
  }
  if (buffer.kind === 'many' && item.kind === 'many') {
    return many(item.items.map((sub, i) => writeItem(buffer.items[i], sub)))
  }
  return item
}
