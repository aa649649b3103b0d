import { parseAbi } from "viem";

export const TIMELOCK_ADMIN_FUNCTIONS = parseAbi([
	"function addCalldataCheck(address target, bytes4 selector, uint16 startIndex, uint16 endIndex, bytes[] data, bool[] isSelfAddressCheck)",
	"function addCalldataChecks(address[] targets, bytes4[] selectors, uint16[] startIndexes, uint16[] endIndexes, bytes[][] datas, bool[][] isSelfAddressChecks)",
	"function removeCalldataCheck(address target, bytes4 selector, uint256 index)",
]);
