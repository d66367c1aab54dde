import { describeBytesCacheContract } from "../../../ports/__tests__/bytes-cache.contract"
import { MemoryBytesCache } from "../memory-bytes-cache"

describeBytesCacheContract(
  "MemoryBytesCache",
  (clock) => new MemoryBytesCache({ clock }, { maxEntries: 100 }),
)
