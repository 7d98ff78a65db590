/**
 * POSIX sh fragment. Works in sh, dash, bash, zsh and ksh.
 */
export function generatePosixFragment(): string {
  return `#!/bin/sh
# wasmedge-env shell setup
# Source this file (". <file>"); executing it has no effect on your shell.

# Wrap the value in colons so a match is always a whole segment
case ":\${PATH:-}:" in
    *:"{WASMEDGE_BIN_DIR}":*)
        ;;
    *)
        export PATH="{WASMEDGE_BIN_DIR}\${PATH:+:\${PATH}}"
        ;;
esac

case ":\${LD_LIBRARY_PATH:-}:" in
    *:"{WASMEDGE_LIB_DIR}":*)
        ;;
    *)
        export LD_LIBRARY_PATH="{WASMEDGE_LIB_DIR}\${LD_LIBRARY_PATH:+:\${LD_LIBRARY_PATH}}"
        ;;
esac
`;
}
