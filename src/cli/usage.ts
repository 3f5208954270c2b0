export const USAGE = `Usage: bootcamp-iso-patcher <target_iso> <reference_iso>
         [output_iso] [options]

Patches a Windows 11 installation ISO so Boot Camp Assistant accepts it as a
Windows 10 ISO. The reference ISO supplies the version strings and volume label.

Arguments:
  target_iso             Windows 11 ISO to patch
  reference_iso          Windows 10 ISO to imitate
  output_iso             destination (default: <target stem>_bootcamp.iso
                         next to the target)

Options:
  --config PATH          TOML or JSON config (default:
                         bootcamp-patcher.toml or .json in the cwd)
  --profile NAME         apply profiles.NAME from the config
  --volume-label LABEL   volume label for the output (at most 32 characters)
  --work-dir DIR         parent directory for the temporary workspace
  --no-validate          skip size and structure checks of the authored image
  --inspect ISO          print the volume descriptors of ISO as JSON and exit
  -h, --help             show this help

Environment:
  LOG_LEVEL, LOG_PRETTY, BOOTCAMP_PATCHER_WORK_DIR,
  BOOTCAMP_PATCHER_VOLUME_LABEL, BOOTCAMP_PATCHER_VALIDATION
  tool paths: BOOTCAMP_PATCHER_WIMLIB, BOOTCAMP_PATCHER_HIVEXGET,
    BOOTCAMP_PATCHER_HIVEXREGEDIT, BOOTCAMP_PATCHER_7Z,
    BOOTCAMP_PATCHER_MKISOFS, BOOTCAMP_PATCHER_XORRISO
`;
