/**
 * Share and Square Layout Constants
 *
 * Byte widths of every field in a share, the content capacity that remains
 * for each share kind, and the protocol bounds on versions and square sizes.
 * All multi-byte integers in a share are big-endian.
 */

/** Size of a share in bytes */
export const SHARE_SIZE = 512

/** Size of the namespace version prefix */
export const NAMESPACE_VERSION_SIZE = 1

/** Size of a namespace id */
export const NAMESPACE_ID_SIZE = 28

/** Size of a namespace (version + id) */
export const NAMESPACE_SIZE = NAMESPACE_VERSION_SIZE + NAMESPACE_ID_SIZE

/** Index of the version byte inside a namespace */
export const NAMESPACE_VERSION_INDEX = 0

/** First namespace version */
export const NAMESPACE_VERSION_ZERO = 0

/** Highest namespace version, used by the secondary reserved namespaces */
export const NAMESPACE_VERSION_MAX = 0xff

/** Number of leading zero bytes in a version zero namespace id */
export const NAMESPACE_VERSION_ZERO_PREFIX_SIZE = 18

/** User-specified bytes available in a version zero namespace id */
export const NAMESPACE_VERSION_ZERO_ID_SIZE =
  NAMESPACE_ID_SIZE - NAMESPACE_VERSION_ZERO_PREFIX_SIZE

/** Namespace versions a user may pick for a blob */
export const SUPPORTED_BLOB_NAMESPACE_VERSIONS: readonly number[] = [
  NAMESPACE_VERSION_ZERO,
]

/** Info byte: share version in bits 1-7, sequence start flag in bit 0 */
export const SHARE_INFO_BYTES = 1

/** Sequence length field, present in the first share of a sequence */
export const SEQUENCE_LEN_BYTES = 4

/** Reserved offset field, present in every compact share */
export const SHARE_RESERVED_BYTES = 4

/** Signer field of version 1 and 2 sequence start shares */
export const SIGNER_SIZE = 20

/** Fibre blob version prefix of a version 2 blob */
export const FIBRE_BLOB_VERSION_SIZE = 4

/** Commitment carried by a version 2 blob */
export const FIBRE_COMMITMENT_SIZE = 32

export const SHARE_VERSION_ZERO = 0
export const SHARE_VERSION_ONE = 1
export const SHARE_VERSION_TWO = 2

/** Share version used when the caller has no reason to pick another */
export const DEFAULT_SHARE_VERSION = SHARE_VERSION_ZERO

/** Largest value that fits in the 7 version bits of the info byte */
export const MAX_SHARE_VERSION = 127

export const SUPPORTED_SHARE_VERSIONS: readonly number[] = [
  SHARE_VERSION_ZERO,
  SHARE_VERSION_ONE,
  SHARE_VERSION_TWO,
]

/** Bytes usable for data in the first compact share of a sequence */
export const FIRST_COMPACT_SHARE_CONTENT_SIZE =
  SHARE_SIZE -
  NAMESPACE_SIZE -
  SHARE_INFO_BYTES -
  SEQUENCE_LEN_BYTES -
  SHARE_RESERVED_BYTES

/** Bytes usable for data in a continuation compact share */
export const CONTINUATION_COMPACT_SHARE_CONTENT_SIZE =
  SHARE_SIZE - NAMESPACE_SIZE - SHARE_INFO_BYTES - SHARE_RESERVED_BYTES

/** Bytes usable for data in the first sparse share of a sequence */
export const FIRST_SPARSE_SHARE_CONTENT_SIZE =
  SHARE_SIZE - NAMESPACE_SIZE - SHARE_INFO_BYTES - SEQUENCE_LEN_BYTES

/** Bytes usable for data in a first sparse share that carries a signer */
export const FIRST_SPARSE_SHARE_CONTENT_SIZE_WITH_SIGNER =
  FIRST_SPARSE_SHARE_CONTENT_SIZE - SIGNER_SIZE

/** Bytes usable for data in a continuation sparse share */
export const CONTINUATION_SPARSE_SHARE_CONTENT_SIZE =
  SHARE_SIZE - NAMESPACE_SIZE - SHARE_INFO_BYTES

/** Smallest original square width */
export const MIN_SQUARE_SIZE = 1

/** Smallest number of shares in an original square */
export const MIN_SHARE_COUNT = MIN_SQUARE_SIZE * MIN_SQUARE_SIZE

/**
 * Square width assumed when sizing an index wrapper before its blobs are
 * placed. Share indexes are varints, so the largest index gives the largest
 * wrapper.
 */
export const SQUARE_SIZE_UPPER_BOUND = 128

/** Default cap on the original square width */
export const DEFAULT_MAX_SQUARE_SIZE = 128

/** Default number of subtree roots a blob commitment may span per row */
export const DEFAULT_SUBTREE_ROOT_THRESHOLD = 64

/** Magic type id tagging a blob-carrying transaction */
export const BLOB_TX_TYPE_ID = 'BLOB'

/** Magic type id tagging an index-wrapped transaction */
export const INDEX_WRAPPER_TYPE_ID = 'INDX'
