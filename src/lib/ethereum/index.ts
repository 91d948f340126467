export { checksumAddress, hashAddressWithIndex, xorSubAccount } from "./address.js";
