// Service configuration and launch defaults
export const SERVICE = 'device-launcher';

// Registry used when no positional argument is given
export const DEFAULT_REGISTRY = 'iotlab-registry';
// Private key handed to the sample client when KEY_FILE is unset
export const DEFAULT_KEY_FILE = '/var/key/rsa_private.pem';

// Fixed flags; the sample client also accepts 'state' and 'ES256'
export const MESSAGE_TYPE = 'event';
export const ALGORITHM = 'RS256';

// Sample client invocation (resolved against the working directory)
export const DEFAULT_SAMPLE_INTERPRETER = 'python3';
export const DEFAULT_SAMPLE_SCRIPT = 'my-sample.py';

export const EXIT_CONFIG_ERROR = 255;
export const EXIT_COMMAND_NOT_FOUND = 127;
export const EXIT_FAILURE = 1;
