export const config = {
  program: {
    name: 'pngmsg',
    description: 'Hide, read and remove text messages in PNG chunks',
    version: '1.0.0'
  },
  files: {
    // Output is written to `<path>.<pid><tempSuffix>` and renamed over the original
    tempSuffix: '.tmp'
  },
  logging: {
    verbose: false
  }
};
