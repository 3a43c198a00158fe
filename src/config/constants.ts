export const DEFAULT_SERVICE_NAME = 'aws-log-dispatch'
