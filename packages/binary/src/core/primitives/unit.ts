import type { BinaryCodec } from "../../ports/codec"
import { staticSizer } from "../size/sizer"

export const unit: BinaryCodec<undefined> = {
  name: "unit",
  encode: () => {},
  decode: (_buffer, offset) => [offset, undefined],
  sizer: staticSizer(0),
}
