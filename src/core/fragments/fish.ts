/**
 * Fish fragment. Fish treats variables ending in PATH as lists and joins
 * them with colons on export, so an unset variable ends up holding just
 * the prepended directory.
 */
export function generateFishFragment(): string {
  return `# wasmedge-env shell setup
# Source this file ("source <file>") from config.fish or conf.d.

if not contains -- "{WASMEDGE_BIN_DIR}" $PATH
    set -gx PATH "{WASMEDGE_BIN_DIR}" $PATH
end

if not contains -- "{WASMEDGE_LIB_DIR}" $LD_LIBRARY_PATH
    set -gx LD_LIBRARY_PATH "{WASMEDGE_LIB_DIR}" $LD_LIBRARY_PATH
end
`;
}
