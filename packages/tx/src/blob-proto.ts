/**
 * Blob wire encoding
 *
 * message BlobProto {
 *   bytes  namespace_id      = 1;
 *   bytes  data              = 2;
 *   uint32 share_version     = 3;
 *   uint32 namespace_version = 4;
 *   bytes  signer            = 5;
 * }
 */

import {
  ProtoWriter,
  readBytes,
  readProtoFields,
  readUint32,
} from '@dasquare/serialization'
import { Blob, Namespace } from '@dasquare/shares'
import {
  MAX_SHARE_VERSION,
  NAMESPACE_VERSION_MAX,
  type Safe,
  safeError,
} from '@dasquare/types'

export function marshalBlob(blob: Blob): Uint8Array {
  return new ProtoWriter()
    .bytes(1, blob.namespace.id)
    .bytes(2, blob.data)
    .uint32(3, blob.shareVersion)
    .uint32(4, blob.namespace.version)
    .bytes(5, blob.signer)
    .finish()
}

export function unmarshalBlob(bytes: Uint8Array): Safe<Blob> {
  const [error, fields] = readProtoFields(bytes)
  if (error) {
    return safeError(new Error(`Failed to unmarshal blob: ${error.message}`))
  }

  let namespaceId = new Uint8Array(0)
  let data = new Uint8Array(0)
  let signer = new Uint8Array(0)
  let shareVersion = 0
  let namespaceVersion = 0

  for (const field of fields) {
    switch (field.fieldNumber) {
      case 1:
      case 2:
      case 5: {
        const [fieldError, value] = readBytes(field)
        if (fieldError) return safeError(fieldError)
        if (field.fieldNumber === 1) namespaceId = value
        else if (field.fieldNumber === 2) data = value
        else signer = value
        break
      }
      case 3:
      case 4: {
        const [fieldError, value] = readUint32(field)
        if (fieldError) return safeError(fieldError)
        if (field.fieldNumber === 3) shareVersion = value
        else namespaceVersion = value
        break
      }
    }
  }

  if (namespaceVersion > NAMESPACE_VERSION_MAX) {
    return safeError(
      new Error('Namespace version can not be greater than MaxNamespaceVersion'),
    )
  }
  if (shareVersion > MAX_SHARE_VERSION) {
    return safeError(
      new Error(
        `Share version can not be greater than MaxShareVersion ${MAX_SHARE_VERSION}`,
      ),
    )
  }
  const [nsError, namespace] = Namespace.create(namespaceVersion, namespaceId)
  if (nsError) {
    return safeError(new Error(`Invalid namespace: ${nsError.message}`))
  }
  return Blob.create(
    namespace,
    data.slice(),
    shareVersion,
    signer.length > 0 ? signer.slice() : undefined,
  )
}
