import { colors } from "./colors.js";

export function helpCommand(): void {
  console.log(`${colors.bold}wasmedge-env${colors.reset} - Put a WasmEdge install on PATH and LD_LIBRARY_PATH

${colors.bold}USAGE:${colors.reset}
  wasmedge-env <command> [options]

${colors.bold}COMMANDS:${colors.reset}
  register <dir>                   Print PATH with <dir> prepended unless already present
  register <dir> --var LD_LIBRARY_PATH
                                   Same, against another path-list variable
  env                              Print the POSIX shell fragment for the install
  env --shell fish                 Print the fish fragment
  env --template                   Print the fragment with its placeholders
  setup                            Write env files and hook them into shell profiles
  setup --dry-run                  Show what setup would change
  install                          Alias for setup
  teardown                         Remove env files and profile hooks
  uninstall                        Alias for teardown
  init                             Create config file (~/.config/wasmedge-env/config.toml)
  help                             Show this help message
  version                          Show version

${colors.bold}GLOBAL OPTIONS:${colors.reset}
  --config <path>                  Use custom config file

${colors.bold}ENVIRONMENT:${colors.reset}
  WASMEDGE_ENV_HOME                Config directory override
  XDG_CONFIG_HOME                  Base config directory (default: ~/.config)
  NO_COLOR                         Disable colored output

${colors.bold}EXAMPLES:${colors.reset}
  ${colors.dim}# Set up the default install (~/.wasmedge):${colors.reset}
  wasmedge-env setup

  ${colors.dim}# Use an install somewhere else for this shell session only:${colors.reset}
  eval "$(wasmedge-env env --dir /opt/wasmedge)"

  ${colors.dim}# Fish:${colors.reset}
  wasmedge-env env --shell fish --dir /opt/wasmedge | source
`);
}
