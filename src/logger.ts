import Logging from '@fjell/logging';

const LibLogger = Logging.getLogger('frame-cache');

export default LibLogger;
