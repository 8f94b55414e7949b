import { createHash } from 'crypto';
import { isIP } from 'net';

export const KERNEL_RELEASE = '5.15.0-91-generic';
export const KERNEL_VERSION = '#101-Ubuntu SMP Tue Nov 14 13:30:08 UTC 2023';

export const PS_OUTPUT =
    '  PID TTY          TIME CMD\n' +
    '    1 pts/0    00:00:00 bash\n' +
    '  234 pts/0    00:00:00 ps\n';

export const IFCONFIG_OUTPUT =
    'eth0: flags=4163<UP,BROADCAST,RUNNING,MULTICAST>  mtu 1500\n' +
    '        inet 192.168.1.100  netmask 255.255.255.0  broadcast 192.168.1.255\n' +
    '        inet6 fe80::a00:27ff:fe4e:66a1  prefixlen 64  scopeid 0x20<link>\n' +
    '        ether 08:00:27:4e:66:a1  txqueuelen 1000  (Ethernet)\n' +
    '        RX packets 1234  bytes 567890 (567.8 KB)\n' +
    '        RX errors 0  dropped 0  overruns 0  frame 0\n' +
    '        TX packets 890  bytes 123456 (123.4 KB)\n' +
    '        TX errors 0  dropped 0 overruns 0  carrier 0  collisions 0\n' +
    '\n' +
    'lo: flags=73<UP,LOOPBACK,RUNNING>  mtu 65536\n' +
    '        inet 127.0.0.1  netmask 255.0.0.0\n' +
    '        loop  txqueuelen 1000  (Local Loopback)\n';

export const IP_ADDR_OUTPUT =
    '1: lo: <LOOPBACK,UP,LOWER_UP> mtu 65536 qdisc noqueue state UNKNOWN group default qlen 1000\n' +
    '    link/loopback 00:00:00:00:00:00 brd 00:00:00:00:00:00\n' +
    '    inet 127.0.0.1/8 scope host lo\n' +
    '       valid_lft forever preferred_lft forever\n' +
    '2: eth0: <BROADCAST,MULTICAST,UP,LOWER_UP> mtu 1500 qdisc fq_codel state UP group default qlen 1000\n' +
    '    link/ether 08:00:27:4e:66:a1 brd ff:ff:ff:ff:ff:ff\n' +
    '    inet 192.168.1.100/24 brd 192.168.1.255 scope global eth0\n' +
    '       valid_lft forever preferred_lft forever\n';

export const IP_USAGE = 'Usage: ip [ OPTIONS ] OBJECT { COMMAND | help }\n';

export const NETSTAT_OUTPUT =
    'Active Internet connections (servers and established)\n' +
    'Proto Recv-Q Send-Q Local Address           Foreign Address         State\n' +
    'tcp        0      0 0.0.0.0:22              0.0.0.0:*               LISTEN\n' +
    'tcp        0      0 192.168.1.100:22        192.168.1.50:54321      ESTABLISHED\n';

/**
 * `YYYY-MM-DD HH:MM:SS` in UTC, the way wget stamps its lines
 */
export function wgetTimestamp(date: Date): string {
    return date.toISOString().replace('T', ' ').slice(0, 19);
}

/**
 * Stable made-up address for a host name, so repeated fetches of one host agree
 */
export function resolvedAddress(host: string): string {
    const literal = host.replace(/^\[|\]$/g, '');
    if (isIP(literal) !== 0) {
        return literal;
    }
    const digest = createHash('sha256').update(host).digest();
    return `${(digest[0] % 223) + 1}.${digest[1]}.${digest[2]}.${(digest[3] % 254) + 1}`;
}

export function humanSize(bytes: number): string {
    if (bytes < 1024) {
        return String(bytes);
    }
    if (bytes < 1024 * 1024) {
        return `${(bytes / 1024).toFixed(1)}K`;
    }
    return `${(bytes / (1024 * 1024)).toFixed(1)}M`;
}

function defaultPort(url: URL): string {
    return url.port || (url.protocol === 'https:' ? '443' : '80');
}

function wgetHeader(url: URL, now: Date): string {
    return `--${wgetTimestamp(now)}--  ${url.toString()}\n`;
}

function wgetResolved(url: URL): string {
    const address = resolvedAddress(url.hostname);
    return `Resolving ${url.hostname} (${url.hostname})... ${address}\n`;
}

function wgetConnecting(url: URL): string {
    const address = resolvedAddress(url.hostname);
    return `Connecting to ${url.hostname} (${url.hostname})|${address}|:${defaultPort(url)}... `;
}

export type WgetFailure =
    | 'dns'
    | 'connect'
    | 'timeout'
    | 'unreachable'
    | 'network'
    | 'too_large';

export type SaveFailure = 'is_directory' | 'not_directory';

function saveFailureText(failure: SaveFailure): string {
    return failure === 'is_directory' ? 'Is a directory' : 'Not a directory';
}

export const wget = {
    missingUrl(): string {
        return "wget: missing URL\nUsage: wget [OPTION]... [URL]...\n\nTry `wget --help' for more options.\n";
    },

    unsupportedScheme(raw: string): string {
        return `${raw}: Unsupported scheme.\n`;
    },

    invalidUrl(raw: string): string {
        return `${raw}: Invalid host name.\n`;
    },

    success(url: URL, now: Date, size: number, contentType: string, saveAs: string): string {
        const length = size < 1024 ? `${size}` : `${size} (${humanSize(size)})`;
        const label = saveAs.length > 19 ? saveAs.slice(0, 19) : saveAs.padEnd(19);
        return (
            wgetHeader(url, now) +
            wgetResolved(url) +
            wgetConnecting(url) +
            'connected.\n' +
            'HTTP request sent, awaiting response... 200 OK\n' +
            `Length: ${length} [${contentType}]\n` +
            `Saving to: ‘${saveAs}’\n` +
            '\n' +
            `${label} 100%[===================>] ${humanSize(size).padStart(7)}  --.-KB/s    in 0s\n` +
            '\n' +
            `${wgetTimestamp(now)} (12.4 MB/s) - ‘${saveAs}’ saved [${size}/${size}]\n` +
            '\n'
        );
    },

    saveFailed(saveAs: string, failure: SaveFailure): string {
        return `${saveAs}: ${saveFailureText(failure)}\n`;
    },

    httpError(url: URL, now: Date, status: number, statusText: string): string {
        return (
            wgetHeader(url, now) +
            wgetResolved(url) +
            wgetConnecting(url) +
            'connected.\n' +
            `HTTP request sent, awaiting response... ${status} ${statusText}\n` +
            `${wgetTimestamp(now)} ERROR ${status}: ${statusText}.\n` +
            '\n'
        );
    },

    failure(url: URL, now: Date, failure: WgetFailure): string {
        const header = wgetHeader(url, now);
        switch (failure) {
            case 'dns':
                return (
                    header +
                    `Resolving ${url.hostname} (${url.hostname})... failed: Name or service not known.\n` +
                    `wget: unable to resolve host address ‘${url.hostname}’\n`
                );
            case 'connect':
                return header + wgetResolved(url) + wgetConnecting(url) + 'failed: Connection refused.\n';
            case 'timeout':
                return header + wgetResolved(url) + wgetConnecting(url) + 'failed: Connection timed out.\nRetrying.\n\n';
            case 'unreachable':
                return header + wgetResolved(url) + wgetConnecting(url) + 'failed: Network is unreachable.\n';
            case 'network':
            case 'too_large':
                return (
                    header +
                    wgetResolved(url) +
                    wgetConnecting(url) +
                    'connected.\n' +
                    'HTTP request sent, awaiting response... Read error (Connection reset by peer) in headers.\n' +
                    'Retrying.\n' +
                    '\n'
                );
        }
    },
};

export const curl = {
    missingUrl(): string {
        return "curl: try 'curl --help' or 'curl --manual' for more information\n";
    },

    unsupportedScheme(scheme: string): string {
        return `curl: (1) Protocol "${scheme}" not supported\n`;
    },

    invalidUrl(): string {
        return 'curl: (3) URL using bad/illegal format or missing URL\n';
    },

    /**
     * Progress meter printed when the body goes to a file
     */
    progress(size: number): string {
        const total = humanSize(size).padStart(5);
        const speed = humanSize(size * 10).padStart(6);
        return (
            '  % Total    % Received % Xferd  Average Speed   Time    Time     Time  Current\n' +
            '                                 Dload  Upload   Total   Spent    Left  Speed\n' +
            `100 ${total}  100 ${total}    0     0 ${speed}      0 --:--:-- --:--:-- --:--:-- ${speed}\n`
        );
    },

    saveFailed(saveAs: string, failure: SaveFailure): string {
        return (
            `Warning: Failed to create the file ${saveAs}: ${saveFailureText(failure)}\n` +
            'curl: (23) Failure writing output to destination\n'
        );
    },

    failure(url: URL, failure: WgetFailure): string {
        const port = defaultPort(url);
        switch (failure) {
            case 'dns':
                return `curl: (6) Could not resolve host: ${url.hostname}\n`;
            case 'connect':
                return `curl: (7) Failed to connect to ${url.hostname} port ${port} after 0 ms: Connection refused\n`;
            case 'unreachable':
                return `curl: (7) Failed to connect to ${url.hostname} port ${port} after 0 ms: Network is unreachable\n`;
            case 'timeout':
                return `curl: (28) Failed to connect to ${url.hostname} port ${port}: Connection timed out\n`;
            case 'too_large':
                return 'curl: (63) Maximum file size exceeded\n';
            case 'network':
                return 'curl: (56) Recv failure: Connection reset by peer\n';
        }
    },
};
