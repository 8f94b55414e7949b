export type LineEvent = { type: 'line'; line: string } | { type: 'interrupt' } | { type: 'eof' };

export interface FeedResult {
    /** Bytes to send back so the terminal shows what was typed */
    echo: string;
    events: LineEvent[];
}

const CTRL_C = '\x03';
const CTRL_D = '\x04';
const BACKSPACE = '\b';
const DELETE = '\x7f';
const ESCAPE = '\x1b';

/**
 * Cooked-mode line editing for a pty channel: echo, backspace, Ctrl-C,
 * Ctrl-D on an empty line. CR, LF and CRLF each end one line.
 * Escape sequences (arrow keys and the like) are dropped.
 */
export class LineDiscipline {
    private buffer = '';
    private lastWasCR = false;
    private escape: 'none' | 'start' | 'csi' | 'ss3' = 'none';

    feed(data: string): FeedResult {
        let echo = '';
        const events: LineEvent[] = [];

        for (const ch of data) {
            if (this.escape !== 'none') {
                this.consumeEscape(ch);
                continue;
            }

            const afterCR = this.lastWasCR;
            this.lastWasCR = ch === '\r';

            switch (ch) {
                case '\r':
                case '\n':
                    if (ch === '\n' && afterCR) {
                        break;
                    }
                    echo += '\r\n';
                    events.push({ type: 'line', line: this.buffer });
                    this.buffer = '';
                    break;
                case BACKSPACE:
                case DELETE:
                    if (this.buffer.length > 0) {
                        this.buffer = this.buffer.slice(0, -1);
                        echo += '\b \b';
                    }
                    break;
                case CTRL_C:
                    echo += '^C\r\n';
                    this.buffer = '';
                    events.push({ type: 'interrupt' });
                    break;
                case CTRL_D:
                    if (this.buffer.length === 0) {
                        events.push({ type: 'eof' });
                    }
                    break;
                case ESCAPE:
                    this.escape = 'start';
                    break;
                default:
                    if (ch >= ' ') {
                        this.buffer += ch;
                        echo += ch;
                    }
            }
        }

        return { echo, events };
    }

    /**
     * Text typed since the last completed line
     */
    pending(): string {
        return this.buffer;
    }

    private consumeEscape(ch: string): void {
        if (this.escape === 'start') {
            this.escape = ch === '[' ? 'csi' : ch === 'O' ? 'ss3' : 'none';
            return;
        }
        if (this.escape === 'ss3') {
            this.escape = 'none';
            return;
        }
        // CSI sequences end with a byte in @..~
        if (ch >= '@' && ch <= '~') {
            this.escape = 'none';
        }
    }
}
