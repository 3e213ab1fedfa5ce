/** Service account every chamber-image client authenticates as. */
export const PRINTER_USERNAME = 'bblp';

export const CHAMBER_IMAGE_PORT = 6000;
export const RTSP_PORT = 322;
export const FTP_CONTROL_PORT = 990;
export const FTP_DATA_PORT_START = 2000;
export const FTP_DATA_PORT_END = 2100;

export const AUTH_PACKET_SIZE = 80;
export const AUTH_BODY_SIZE = 0x40;
export const AUTH_PACKET_TYPE = 0x3000;
export const AUTH_FIELD_SIZE = 32;
export const AUTH_USERNAME_OFFSET = 16;
export const AUTH_ACCESS_CODE_OFFSET = AUTH_USERNAME_OFFSET + AUTH_FIELD_SIZE;

export const FRAME_HEADER_SIZE = 16;
export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

export const RTSP_STREAM_PATH = '/streaming/live/1';
