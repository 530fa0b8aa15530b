// Obsidian adds its DOM helpers at runtime; jsdom needs the ones the plugin calls.
if (typeof HTMLElement !== 'undefined' && typeof HTMLElement.prototype.setCssStyles !== 'function') {
    HTMLElement.prototype.setCssStyles = function (this: HTMLElement, styles: Partial<CSSStyleDeclaration>) {
        Object.assign(this.style, styles);
    };
}
